import { Dependency, ecosystemFor } from '../../models/Dependency';
import { Language } from '../../models/Language';
import { Project } from '../../models/Project';

export function dependency(
    name: string,
    version: string,
    options: { isInternal?: boolean; constraint?: string; language?: Language } = {}
): Dependency {
    return {
        name,
        version,
        constraint: options.constraint ?? version,
        minVersion: version,
        maxVersion: '',
        isInternal: options.isInternal ?? false,
        ecosystem: ecosystemFor(options.language ?? 'nodejs'),
    };
}

export function project(
    repositoryName: string,
    path: string,
    language: Language,
    dependencies: Dependency[],
    repositoryId = 1
): Project {
    const suffix = path === '' ? 'root' : path;
    return {
        id: `repo-${repositoryId}-${suffix}-${language}`,
        name: path === '' ? `${repositoryName} ${language}` : `${repositoryName} ${language} (${path})`,
        repository: {
            id: repositoryId,
            name: repositoryName,
            url: `https://gitlab.example.com/org/${repositoryName}`,
            defaultBranch: 'main',
            webUrl: `https://gitlab.example.com/org/${repositoryName}`,
        },
        path,
        language,
        dependencyFiles: [
            {
                path: path === '' ? 'package.json' : `${path}/package.json`,
                language,
                content: Buffer.from('{}'),
                lastModified: new Date('2024-01-02T03:04:05.000Z'),
            },
        ],
        dependencies,
    };
}
