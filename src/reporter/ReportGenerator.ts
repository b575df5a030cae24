import { Project } from '../models/Project';

/**
 * Renders analyzed projects to report files
 */
export interface ReportGenerator {
    /**
     * Write every configured report format and return the paths written
     */
    generate(projects: Project[]): Promise<string[]>;
}
