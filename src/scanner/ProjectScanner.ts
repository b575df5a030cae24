import path from 'path';
import { Repository } from '../models/Repository';
import { DependencyFile, Project } from '../models/Project';
import { Language } from '../models/Language';
import { SourceControlClient } from '../gitlab/SourceControlClient';
import { RepositoryScanner } from './RepositoryScanner';
import logger, { describeError } from '../utils/logger';

// Manifest file names, matched exactly against a path's base name
const MANIFESTS: ReadonlyArray<readonly [string, Language]> = [
    ['go.mod', 'go'],
    ['go.sum', 'go'],
    ['package.json', 'nodejs'],
    ['package-lock.json', 'nodejs'],
    ['yarn.lock', 'nodejs'],
    ['pom.xml', 'java'],
    ['build.gradle', 'java'],
    ['gradle.lockfile', 'java'],
    ['requirements.txt', 'python'],
    ['Pipfile', 'python'],
    ['poetry.lock', 'python'],
    ['uv.lock', 'python'],
    ['setup.py', 'python'],
];

const LANGUAGE_BY_LOWERCASE_NAME = new Map<string, Language>(
    MANIFESTS.map(([fileName, language]) => [fileName.toLowerCase(), language])
);

export interface DependencyFileGroup {
    language: Language;
    path: string;
    files: string[];
}

/**
 * Manifest file names the scanner recognizes
 */
export function supportedFileTypes(): string[] {
    return MANIFESTS.map(([fileName]) => fileName);
}

/**
 * Language of a manifest file, ignoring case. Undefined for anything else.
 */
export function detectLanguageFromFile(filePath: string): Language | undefined {
    return LANGUAGE_BY_LOWERCASE_NAME.get(path.posix.basename(filePath).toLowerCase());
}

/**
 * Directory of a file inside its repository; "" for the root
 */
export function extractProjectPath(filePath: string): string {
    const dir = path.posix.dirname(filePath);
    return dir === '.' || dir === '/' ? '' : dir;
}

export function capitalizeFirst(value: string): string {
    if (value === '') {
        return value;
    }
    const [first, ...rest] = Array.from(value);
    return first.toUpperCase() + rest.join('');
}

/**
 * Keep only paths whose base name is a manifest (case-sensitive)
 */
export function filterDependencyFiles(files: readonly string[]): string[] {
    const supported = new Set(supportedFileTypes());
    return files.filter((file) => supported.has(path.posix.basename(file)));
}

/**
 * Group manifest paths by (language, directory). Groups come out in order of first appearance.
 */
export function groupDependencyFilesByProject(dependencyFiles: readonly string[]): DependencyFileGroup[] {
    const groups = new Map<string, DependencyFileGroup>();

    for (const file of dependencyFiles) {
        const language = detectLanguageFromFile(file);
        if (!language) {
            continue;
        }
        const projectPath = extractProjectPath(file);
        const key = `${language}:${projectPath}`;

        const group = groups.get(key);
        if (group) {
            group.files.push(file);
        } else {
            groups.set(key, { language, path: projectPath, files: [file] });
        }
    }

    return Array.from(groups.values());
}

/**
 * Detects projects in a repository from the manifest files on its default branch
 */
export class ProjectScanner implements RepositoryScanner {
    constructor(private readonly client: SourceControlClient) {}

    async detectProjects(repository: Repository, signal?: AbortSignal): Promise<Project[]> {
        logger.info(`Detecting projects in repository ${repository.name} (${repository.url})`);

        let files: string[];
        try {
            files = await this.client.listFiles(repository.url, signal);
        } catch (error) {
            throw new Error(`failed to get files list for repository ${repository.name}: ${describeError(error)}`, {
                cause: error,
            });
        }

        const dependencyFiles = filterDependencyFiles(files);
        if (dependencyFiles.length === 0) {
            logger.info(`No dependency files found in repository ${repository.name}`);
            return [];
        }

        const projects: Project[] = [];
        for (const group of groupDependencyFilesByProject(dependencyFiles)) {
            const project = await this.createProjectFromGroup(repository, group, signal);
            if (project.dependencyFiles.length > 0) {
                projects.push(project);
            }
        }

        logger.info(`Detected ${projects.length} project(s) in repository ${repository.name}`);
        return projects;
    }

    private async createProjectFromGroup(
        repository: Repository,
        group: DependencyFileGroup,
        signal?: AbortSignal
    ): Promise<Project> {
        const label = capitalizeFirst(group.language);
        const id =
            group.path === ''
                ? `repo-${repository.id}-root-${group.language}`
                : `repo-${repository.id}-${group.path}-${group.language}`;
        const name =
            group.path === '' ? `${repository.name} ${label}` : `${repository.name} ${label} (${group.path})`;

        const dependencyFiles: DependencyFile[] = [];
        for (const file of group.files) {
            let content: Buffer;
            try {
                content = await this.client.getFileContent(repository.url, file, signal);
            } catch (error) {
                signal?.throwIfAborted();
                logger.error(`Failed to get content of ${file} in ${repository.name}: ${describeError(error)}`);
                continue;
            }
            dependencyFiles.push({ path: file, language: group.language, content, lastModified: new Date() });
        }

        return {
            id,
            name,
            repository: { ...repository },
            path: group.path,
            language: group.language,
            dependencyFiles,
            dependencies: [],
        };
    }
}
