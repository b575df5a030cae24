import { Repository } from '../models/Repository';
import { Project } from '../models/Project';

/**
 * Turns a repository into the projects it contains
 */
export interface RepositoryScanner {
    /**
     * Detect every (language, directory) project of a repository, with its manifest files fetched.
     * Rejects only when the repository's file listing cannot be read.
     */
    detectProjects(repository: Repository, signal?: AbortSignal): Promise<Project[]>;
}
