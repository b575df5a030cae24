import { parseStringPromise } from 'xml2js';
import { ManifestParser, ParsedDependency, uniqueDependencies } from './ManifestParser';

// Gradle configurations that declare dependencies
const GRADLE_CONFIGURATIONS = new Set([
    'api',
    'implementation',
    'compileOnly',
    'runtimeOnly',
    'testImplementation',
    'testCompileOnly',
    'testRuntimeOnly',
    'annotationProcessor',
    'kapt',
    'classpath',
    'compile',
    'runtime',
    'testCompile',
]);

const GRADLE_STRING_NOTATION = /^\s*(\w+)\s*\(?\s*['"]([^'":\s]+):([^'":\s]+)(?::([^'"\s@]+))?(?:@\w+)?['"]/;
const GRADLE_MAP_NOTATION =
    /^\s*(\w+)\s*\(?\s*group\s*:\s*['"]([^'"]+)['"]\s*,\s*name\s*:\s*['"]([^'"]+)['"](?:\s*,\s*version\s*:\s*['"]([^'"]+)['"])?/;

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// xml2js wraps every child in an array
function children(node: unknown, key: string): unknown[] {
    if (!isNode(node)) {
        return [];
    }
    const value = node[key];
    return Array.isArray(value) ? value : [];
}

function child(node: unknown, key: string): unknown {
    return children(node, key)[0];
}

function text(node: unknown, key: string): string | undefined {
    const value = child(node, key);
    return typeof value === 'string' ? value.trim() : undefined;
}

/**
 * Maven pom.xml, Gradle build scripts (Groovy and Kotlin DSL string and map notation)
 * and gradle.lockfile
 */
export class JavaManifestParser implements ManifestParser {
    readonly language = 'java' as const;

    canParse(fileName: string): boolean {
        return fileName === 'pom.xml' || fileName === 'build.gradle' || fileName === 'gradle.lockfile';
    }

    async parse(fileName: string, content: string): Promise<ParsedDependency[]> {
        switch (fileName) {
            case 'pom.xml':
                return this.parsePom(content);
            case 'build.gradle':
                return this.parseGradleBuild(content);
            case 'gradle.lockfile':
                return this.parseGradleLock(content);
            default:
                throw new Error(`unsupported Java file: ${fileName}`);
        }
    }

    /**
     * Direct and managed dependencies, with ${...} placeholders resolved from
     * <properties> and the project's own coordinates
     */
    private async parsePom(content: string): Promise<ParsedDependency[]> {
        const document: unknown = await parseStringPromise(content);
        // The root element is the only one xml2js does not wrap in an array
        const project = isNode(document) ? document.project : undefined;
        if (!isNode(project)) {
            throw new Error('missing <project> root element');
        }

        const properties = new Map<string, string>();
        const propertiesNode = child(project, 'properties');
        if (isNode(propertiesNode)) {
            for (const key of Object.keys(propertiesNode)) {
                const value = text(propertiesNode, key);
                if (value !== undefined) {
                    properties.set(key, value);
                }
            }
        }
        const parent = child(project, 'parent');
        const coordinates: Array<[string, string | undefined]> = [
            ['project.groupId', text(project, 'groupId') ?? text(parent, 'groupId')],
            ['project.version', text(project, 'version') ?? text(parent, 'version')],
            ['project.parent.version', text(parent, 'version')],
            ['version', text(project, 'version') ?? text(parent, 'version')],
        ];
        for (const [key, value] of coordinates) {
            if (value !== undefined && !properties.has(key)) {
                properties.set(key, value);
            }
        }

        const resolve = (value: string): string =>
            value.replace(/\$\{([^}]+)\}/g, (placeholder, key: string) => properties.get(key) ?? placeholder);

        const dependencyNodes = [
            ...children(child(project, 'dependencies'), 'dependency'),
            ...children(child(child(project, 'dependencyManagement'), 'dependencies'), 'dependency'),
        ];

        const dependencies: ParsedDependency[] = [];
        for (const node of dependencyNodes) {
            const groupId = text(node, 'groupId');
            const artifactId = text(node, 'artifactId');
            if (!groupId || !artifactId) {
                continue;
            }
            const constraint = resolve(text(node, 'version') ?? '');
            dependencies.push({
                name: `${resolve(groupId)}:${resolve(artifactId)}`,
                version: constraint,
                constraint,
            });
        }

        return uniqueDependencies(dependencies);
    }

    private parseGradleBuild(content: string): ParsedDependency[] {
        const dependencies: ParsedDependency[] = [];

        for (const line of content.split(/\r?\n/)) {
            const match = GRADLE_STRING_NOTATION.exec(line) ?? GRADLE_MAP_NOTATION.exec(line);
            if (!match) {
                continue;
            }
            const [, configuration, group, artifact, version] = match;
            if (!GRADLE_CONFIGURATIONS.has(configuration)) {
                continue;
            }
            dependencies.push({ name: `${group}:${artifact}`, version: version ?? '', constraint: version ?? '' });
        }

        return uniqueDependencies(dependencies);
    }

    /**
     * Lines of "group:artifact:version=configurations"
     */
    private parseGradleLock(content: string): ParsedDependency[] {
        const dependencies: ParsedDependency[] = [];

        for (const rawLine of content.split(/\r?\n/)) {
            const line = rawLine.trim();
            if (line === '' || line.startsWith('#') || line.startsWith('empty=')) {
                continue;
            }
            const [coordinates] = line.split('=');
            const [group, artifact, version] = coordinates.split(':');
            if (!group || !artifact || !version) {
                continue;
            }
            dependencies.push({ name: `${group}:${artifact}`, version, constraint: version });
        }

        return uniqueDependencies(dependencies);
    }
}
