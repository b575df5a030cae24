import path from 'path';
import { Dependency, ecosystemFor } from '../models/Dependency';
import { DependencyFile } from '../models/Project';
import { DependencyExtractor } from './DependencyExtractor';
import { ManifestParser, ParsedDependency } from './ManifestParser';
import { GoModParser } from './GoModParser';
import { NodeManifestParser } from './NodeManifestParser';
import { JavaManifestParser } from './JavaManifestParser';
import { PythonManifestParser } from './PythonManifestParser';
import { parseConstraint } from './VersionRange';
import logger, { describeError } from '../utils/logger';

export class UnsupportedManifestError extends Error {
    constructor(
        message: string,
        public readonly filePath: string
    ) {
        super(message);
        this.name = 'UnsupportedManifestError';
    }
}

export class ManifestParseError extends Error {
    constructor(
        message: string,
        public readonly filePath: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ManifestParseError';
    }
}

/**
 * Registry of per-language manifest parsers
 */
export class DependencyParser implements DependencyExtractor {
    private parsers: Map<string, ManifestParser> = new Map();

    constructor() {
        this.registerParser(new GoModParser());
        this.registerParser(new NodeManifestParser());
        this.registerParser(new JavaManifestParser());
        this.registerParser(new PythonManifestParser());
    }

    registerParser(parser: ManifestParser): void {
        this.parsers.set(parser.language, parser);
        logger.debug(`Registered manifest parser for: ${parser.language}`);
    }

    getParser(language: string): ManifestParser | undefined {
        return this.parsers.get(language);
    }

    async parseFile(file: DependencyFile, signal?: AbortSignal): Promise<Dependency[]> {
        signal?.throwIfAborted();

        const parser = this.getParser(file.language);
        if (!parser) {
            throw new UnsupportedManifestError(`unsupported language: ${file.language}`, file.path);
        }
        const fileName = path.posix.basename(file.path);
        if (!parser.canParse(fileName)) {
            throw new UnsupportedManifestError(`unsupported ${file.language} file: ${fileName}`, file.path);
        }

        const content = file.content.toString('utf-8').replace(/^\uFEFF/, '');
        if (content.trim() === '') {
            return [];
        }

        let parsed: ParsedDependency[];
        try {
            parsed = await parser.parse(fileName, content);
        } catch (error) {
            throw new ManifestParseError(
                `failed to parse ${file.language} file ${file.path}: ${describeError(error)}`,
                file.path,
                { cause: error }
            );
        }

        const ecosystem = ecosystemFor(file.language);
        logger.debug(`Parsed ${parsed.length} dependencies from ${file.path}`);

        return parsed.map(({ name, version, constraint }) => {
            const { minVersion, maxVersion } = parseConstraint(constraint);
            return { name, version, constraint, minVersion, maxVersion, isInternal: false, ecosystem };
        });
    }
}
