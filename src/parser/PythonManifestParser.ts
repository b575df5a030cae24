import { ManifestParser, ParsedDependency, uniqueDependencies } from './ManifestParser';
import { parseConstraint } from './VersionRange';

const PIPFILE_SECTIONS = new Set(['packages', 'dev-packages']);
const REQUIREMENT = /^([A-Za-z0-9][A-Za-z0-9._-]*)\s*(?:\[[^\]]*\])?\s*(.*)$/;

/**
 * One PEP 508 requirement ("requests[socks]>=2.0,<3; python_version>'3.8'").
 * Markers and extras are dropped; direct URL references yield no dependency.
 */
export function parseRequirement(spec: string): ParsedDependency | undefined {
    const withoutMarker = spec.split(';')[0].trim();
    const match = REQUIREMENT.exec(withoutMarker);
    if (!match) {
        return undefined;
    }
    const [, name, rest] = match;
    if (rest.startsWith('@')) {
        return undefined;
    }
    const constraint = rest.replace(/^\((.*)\)$/, '$1').replace(/\s+/g, '');
    const pinned = /^===?([^,]+)$/.exec(constraint);
    const version = pinned ? pinned[1] : parseConstraint(constraint).minVersion;
    return { name, version, constraint };
}

// Value of a `key = "..."` line
function tomlString(line: string, key: string): string | undefined {
    const match = new RegExp(`^${key}\\s*=\\s*"([^"]*)"`).exec(line);
    return match ? match[1] : undefined;
}

/**
 * requirements.txt, Pipfile, poetry.lock, uv.lock and setup.py
 */
export class PythonManifestParser implements ManifestParser {
    readonly language = 'python' as const;

    canParse(fileName: string): boolean {
        return ['requirements.txt', 'Pipfile', 'poetry.lock', 'uv.lock', 'setup.py'].includes(fileName);
    }

    async parse(fileName: string, content: string): Promise<ParsedDependency[]> {
        switch (fileName) {
            case 'requirements.txt':
                return this.parseRequirements(content);
            case 'Pipfile':
                return this.parsePipfile(content);
            case 'poetry.lock':
            case 'uv.lock':
                return this.parseLockPackages(content);
            case 'setup.py':
                return this.parseSetupPy(content);
            default:
                throw new Error(`unsupported Python file: ${fileName}`);
        }
    }

    private parseRequirements(content: string): ParsedDependency[] {
        const dependencies: ParsedDependency[] = [];
        // Backslash-newline continues a requirement on the next line
        const lines = content.replace(/\\\r?\n/g, ' ').split(/\r?\n/);

        for (const rawLine of lines) {
            const line = rawLine.replace(/(^|\s)#.*$/, '').trim();
            // -r, -e, --index-url and other options; local paths and URLs
            if (line === '' || line.startsWith('-') || line.startsWith('.') || line.startsWith('/') || line.includes('://')) {
                continue;
            }
            const requirement = parseRequirement(line);
            if (requirement) {
                dependencies.push(requirement);
            }
        }

        return uniqueDependencies(dependencies);
    }

    /**
     * [packages] and [dev-packages]: `name = "*"`, `name = "==1.0"` or `name = {version = ">=1.0", ...}`
     */
    private parsePipfile(content: string): ParsedDependency[] {
        const dependencies: ParsedDependency[] = [];
        let inSection = false;

        for (const rawLine of content.split(/\r?\n/)) {
            const line = rawLine.trim();
            const table = /^\[([^\]]+)\]$/.exec(line);
            if (table) {
                inSection = PIPFILE_SECTIONS.has(table[1].trim());
                continue;
            }
            if (!inSection || line === '' || line.startsWith('#')) {
                continue;
            }

            const entry = /^"?([A-Za-z0-9][A-Za-z0-9._-]*)"?\s*=\s*(.+)$/.exec(line);
            if (!entry) {
                continue;
            }
            const [, name, value] = entry;
            let constraint = '';
            const quoted = /^"([^"]*)"/.exec(value);
            if (quoted) {
                constraint = quoted[1];
            } else {
                const inlineVersion = /version\s*=\s*"([^"]*)"/.exec(value);
                constraint = inlineVersion ? inlineVersion[1] : '';
            }
            if (constraint === '*') {
                dependencies.push({ name, version: '', constraint });
                continue;
            }
            const requirement = parseRequirement(`${name}${constraint}`);
            dependencies.push(requirement ?? { name, version: '', constraint });
        }

        return uniqueDependencies(dependencies);
    }

    /**
     * [[package]] tables of poetry.lock and uv.lock. uv lists the project itself
     * with an editable or virtual source; that entry is skipped.
     */
    private parseLockPackages(content: string): ParsedDependency[] {
        const dependencies: ParsedDependency[] = [];
        let current: { name?: string; version?: string; local: boolean } | undefined;

        const flush = () => {
            if (current?.name && current.version !== undefined && !current.local) {
                dependencies.push({ name: current.name, version: current.version, constraint: current.version });
            }
        };

        for (const rawLine of content.split(/\r?\n/)) {
            const line = rawLine.trim();
            if (line.startsWith('[')) {
                if (line === '[[package]]') {
                    flush();
                    current = { local: false };
                } else if (!line.startsWith('[package.')) {
                    flush();
                    current = undefined;
                }
                continue;
            }
            if (!current) {
                continue;
            }
            if (current.name === undefined) {
                current.name = tomlString(line, 'name');
            }
            if (current.version === undefined) {
                current.version = tomlString(line, 'version');
            }
            if (/^source\s*=\s*\{\s*(editable|virtual)\s*=/.test(line)) {
                current.local = true;
            }
        }
        flush();

        return uniqueDependencies(dependencies);
    }

    private parseSetupPy(content: string): ParsedDependency[] {
        const start = /install_requires\s*=\s*\[/.exec(content);
        if (!start) {
            return [];
        }
        const dependencies: ParsedDependency[] = [];
        for (const literal of quotedListItems(content, start.index + start[0].length)) {
            const requirement = parseRequirement(literal);
            if (requirement) {
                dependencies.push(requirement);
            }
        }
        return uniqueDependencies(dependencies);
    }
}

/**
 * String literals of a Python list, read from just after its "[" up to the unquoted "]"
 * that closes it. Brackets inside literals ("requests[socks]") do not end the list.
 */
function quotedListItems(content: string, from: number): string[] {
    const items: string[] = [];
    let quote: string | undefined;
    let literal = '';

    for (let i = from; i < content.length; i++) {
        const char = content[i];
        if (quote) {
            if (char === '\\' && i + 1 < content.length) {
                literal += content[++i];
            } else if (char === quote) {
                items.push(literal);
                quote = undefined;
            } else {
                literal += char;
            }
        } else if (char === '"' || char === "'") {
            quote = char;
            literal = '';
        } else if (char === '#') {
            const newline = content.indexOf('\n', i);
            i = newline === -1 ? content.length : newline;
        } else if (char === ']') {
            break;
        }
    }

    return items;
}
