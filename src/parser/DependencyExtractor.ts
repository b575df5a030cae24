import { Dependency } from '../models/Dependency';
import { DependencyFile } from '../models/Project';

/**
 * Extracts dependency records from a fetched manifest file
 */
export interface DependencyExtractor {
    /**
     * Parse one manifest. Rejects with UnsupportedManifestError for a language or file
     * it has no parser for; an empty manifest yields [].
     */
    parseFile(file: DependencyFile, signal?: AbortSignal): Promise<Dependency[]>;
}
