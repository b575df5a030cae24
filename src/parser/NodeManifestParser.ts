import { ManifestParser, ParsedDependency, uniqueDependencies } from './ManifestParser';
import { parseConstraint } from './VersionRange';

const DEPENDENCY_SECTIONS = ['dependencies', 'devDependencies', 'peerDependencies', 'optionalDependencies'] as const;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(content: string): JsonObject {
    const parsed: unknown = JSON.parse(content);
    if (!isObject(parsed)) {
        throw new Error('expected a JSON object at the top level');
    }
    return parsed;
}

/**
 * package.json, package-lock.json (lockfile v1 to v3) and yarn.lock (classic and berry)
 */
export class NodeManifestParser implements ManifestParser {
    readonly language = 'nodejs' as const;

    canParse(fileName: string): boolean {
        return fileName === 'package.json' || fileName === 'package-lock.json' || fileName === 'yarn.lock';
    }

    async parse(fileName: string, content: string): Promise<ParsedDependency[]> {
        switch (fileName) {
            case 'package.json':
                return this.parsePackageJson(content);
            case 'package-lock.json':
                return this.parsePackageLock(content);
            case 'yarn.lock':
                return this.parseYarnLock(content);
            default:
                throw new Error(`unsupported Node.js file: ${fileName}`);
        }
    }

    /**
     * Declared ranges of every dependency section. A name listed in several sections counts once.
     */
    private parsePackageJson(content: string): ParsedDependency[] {
        const manifest = parseJsonObject(content);
        const dependencies: ParsedDependency[] = [];
        const seen = new Set<string>();

        for (const section of DEPENDENCY_SECTIONS) {
            const entries = manifest[section];
            if (!isObject(entries)) {
                continue;
            }
            for (const [name, range] of Object.entries(entries)) {
                if (typeof range !== 'string' || seen.has(name)) {
                    continue;
                }
                seen.add(name);
                const { minVersion } = parseConstraint(range);
                dependencies.push({ name, version: minVersion || range, constraint: range });
            }
        }

        return dependencies;
    }

    private parsePackageLock(content: string): ParsedDependency[] {
        const lock = parseJsonObject(content);
        const dependencies: ParsedDependency[] = [];

        if (isObject(lock.packages)) {
            // lockfile v2/v3: keys are install paths, "" is the root package
            for (const [installPath, entry] of Object.entries(lock.packages)) {
                if (installPath === '' || !isObject(entry) || entry.link === true) {
                    continue;
                }
                const marker = 'node_modules/';
                const at = installPath.lastIndexOf(marker);
                let name: string;
                if (typeof entry.name === 'string') {
                    name = entry.name;
                } else if (at !== -1) {
                    name = installPath.slice(at + marker.length);
                } else {
                    // Workspace folder without a package name
                    continue;
                }
                if (typeof entry.version === 'string') {
                    dependencies.push({ name, version: entry.version, constraint: entry.version });
                }
            }
        } else if (isObject(lock.dependencies)) {
            collectLockV1(lock.dependencies, dependencies);
        }

        return uniqueDependencies(dependencies);
    }

    private parseYarnLock(content: string): ParsedDependency[] {
        const dependencies: ParsedDependency[] = [];
        let current: { name: string; constraint: string } | undefined;

        for (const line of content.split(/\r?\n/)) {
            if (line.trim() === '' || line.startsWith('#')) {
                continue;
            }

            if (!/^\s/.test(line)) {
                // Entry header: "lodash@^4.17.0", "lodash@^4.17.21": (berry adds "npm:")
                current = line.endsWith(':') ? parseYarnHeader(line.slice(0, -1)) : undefined;
                continue;
            }

            const version = /^\s+version:?\s+"?([^"\s]+)"?/.exec(line);
            if (current && version) {
                dependencies.push({ name: current.name, version: version[1], constraint: current.constraint });
                current = undefined;
            }
        }

        return uniqueDependencies(dependencies);
    }
}

function collectLockV1(entries: JsonObject, dependencies: ParsedDependency[]): void {
    for (const [name, entry] of Object.entries(entries)) {
        if (!isObject(entry)) {
            continue;
        }
        if (typeof entry.version === 'string') {
            dependencies.push({ name, version: entry.version, constraint: entry.version });
        }
        if (isObject(entry.dependencies)) {
            collectLockV1(entry.dependencies, dependencies);
        }
    }
}

const LOCAL_PROTOCOLS = /^(workspace|patch|link|portal|file):/;

function parseYarnHeader(header: string): { name: string; constraint: string } | undefined {
    const firstSpec = header.split(',')[0].trim().replace(/^"|"$/g, '');
    if (firstSpec === '__metadata') {
        return undefined;
    }
    // Scoped packages start with "@", so the separator is the first "@" after index 0
    const at = firstSpec.indexOf('@', 1);
    if (at === -1) {
        return undefined;
    }
    const descriptor = firstSpec.slice(at + 1);
    // Local packages and patched copies of another entry are not dependencies of their own
    if (LOCAL_PROTOCOLS.test(descriptor)) {
        return undefined;
    }
    const constraint = descriptor.replace(/^npm:/, '');
    return { name: firstSpec.slice(0, at), constraint };
}
