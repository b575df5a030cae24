import { Repository } from '../models/Repository';

/**
 * Read-only access to a source-control host
 */
export interface SourceControlClient {
    /**
     * Verify the configured token can read the API
     */
    checkPermissions(signal?: AbortSignal): Promise<void>;

    /**
     * Resolve a repository or group URL to concrete repositories, including
     * every repository of nested subgroups
     */
    resolveRepositories(sourceUrl: string, signal?: AbortSignal): Promise<Repository[]>;

    /**
     * All file paths (not directories) on the repository's default branch
     */
    listFiles(repoUrl: string, signal?: AbortSignal): Promise<string[]>;

    /**
     * Raw content of one file on the repository's default branch
     */
    getFileContent(repoUrl: string, filePath: string, signal?: AbortSignal): Promise<Buffer>;
}
