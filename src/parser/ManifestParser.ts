import { Language } from '../models/Language';

/**
 * A dependency as declared or locked in a manifest, before bounds and ecosystem are attached
 */
export interface ParsedDependency {
    name: string;
    version: string;
    constraint: string;
}

/**
 * Parser for the manifest formats of one language
 */
export interface ManifestParser {
    /**
     * Language of the manifests this parser reads
     */
    readonly language: Language;

    /**
     * Whether this parser understands a file with the given base name
     */
    canParse(fileName: string): boolean;

    /**
     * Extract dependencies from a manifest's text
     */
    parse(fileName: string, content: string): Promise<ParsedDependency[]>;
}

/**
 * Drop repeated name/version pairs, keeping the first occurrence
 */
export function uniqueDependencies(dependencies: ParsedDependency[]): ParsedDependency[] {
    const seen = new Set<string>();
    return dependencies.filter((dependency) => {
        const key = `${dependency.name}@${dependency.version}`;
        if (seen.has(key)) {
            return false;
        }
        seen.add(key);
        return true;
    });
}
