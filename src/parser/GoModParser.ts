import { ManifestParser, ParsedDependency } from './ManifestParser';

const REQUIRE_ENTRY = /^(\S+)\s+(\S+)/;

/**
 * go.mod `require` directives, single-line and block form. go.sum holds only
 * checksums and yields nothing.
 */
export class GoModParser implements ManifestParser {
    readonly language = 'go' as const;

    canParse(fileName: string): boolean {
        return fileName === 'go.mod' || fileName === 'go.sum';
    }

    async parse(fileName: string, content: string): Promise<ParsedDependency[]> {
        if (fileName === 'go.sum') {
            return [];
        }

        const dependencies: ParsedDependency[] = [];
        let inRequireBlock = false;

        for (const rawLine of content.split(/\r?\n/)) {
            const line = stripComment(rawLine).trim();
            if (line === '') {
                continue;
            }

            if (inRequireBlock) {
                if (line === ')') {
                    inRequireBlock = false;
                    continue;
                }
                this.addEntry(line, dependencies);
                continue;
            }

            if (/^require\s*\($/.test(line)) {
                inRequireBlock = true;
            } else if (line.startsWith('require ')) {
                this.addEntry(line.slice('require '.length).trim(), dependencies);
            }
        }

        if (inRequireBlock) {
            throw new Error('unterminated require block');
        }
        return dependencies;
    }

    private addEntry(entry: string, dependencies: ParsedDependency[]): void {
        const match = REQUIRE_ENTRY.exec(entry);
        if (!match) {
            throw new Error(`malformed require entry: ${entry}`);
        }
        const [, name, version] = match;
        dependencies.push({ name: unquote(name), version, constraint: version });
    }
}

function stripComment(line: string): string {
    const index = line.indexOf('//');
    return index === -1 ? line : line.slice(0, index);
}

function unquote(value: string): string {
    return value.replace(/^"(.*)"$/, '$1');
}
