import { Repository } from './Repository';
import { Dependency } from './Dependency';
import { Language } from './Language';

/**
 * A manifest file fetched from a repository
 */
export interface DependencyFile {
    readonly path: string;       // "backend/go.mod"
    readonly language: Language;
    readonly content: Buffer;
    readonly lastModified: Date; // fetch time; the file API exposes no mtime
}

/**
 * One unit of dependency management inside a repository: a (language, directory) pair.
 * A monorepo yields several.
 */
export interface Project {
    readonly id: string;             // "repo-123-backend-go"
    readonly name: string;           // "user-service Go (backend)"
    readonly repository: Repository; // own copy, never shared with other projects
    readonly path: string;           // "backend", or "" for the repository root
    readonly language: Language;
    readonly dependencyFiles: DependencyFile[];
    dependencies: Dependency[];      // attached once by the orchestrator
}
