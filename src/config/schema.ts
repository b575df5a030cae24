import { LogLevel } from '../utils/logger';

export const REPORT_FORMATS = ['html', 'csv', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function isReportFormat(value: string): value is ReportFormat {
    return (REPORT_FORMATS as readonly string[]).includes(value);
}

/**
 * A repository or group to analyze, given by URL or by numeric GitLab ID
 */
export interface RepositoryConfig {
    url?: string;
    id?: number;
    name?: string; // label only
}

/**
 * Configuration schema for the dependency matrix analyzer
 */
export interface AnalyzerConfig {
    gitlab: {
        base_url: string;
        token: string;
    };
    repositories: RepositoryConfig[];
    internal: {
        patterns: string[]; // name patterns, see PatternClassifier
        domains: string[];  // matched like patterns, after them
    };
    output: {
        html_file: string;
        title: string;
        formats: ReportFormat[]; // csv and json land beside the HTML file
    };
    timeout: {
        analysis_timeout_minutes: number;
    };
    concurrency: {
        page_workers: number;
        repository_workers: number; // 0 = one task per repository
        project_workers: number;
        file_workers: number;
        classification_threshold: number;
    };
    logging: {
        level: LogLevel;
        file_dir: string; // empty = console only
    };
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: AnalyzerConfig = {
    gitlab: {
        base_url: '',
        token: '',
    },
    repositories: [],
    internal: {
        patterns: [],
        domains: [],
    },
    output: {
        html_file: 'dependency-matrix.html',
        title: 'Dependency Matrix Report',
        formats: ['html'],
    },
    timeout: {
        analysis_timeout_minutes: 10,
    },
    concurrency: {
        page_workers: 5,
        repository_workers: 0,
        project_workers: 5,
        file_workers: 3,
        classification_threshold: 10,
    },
    logging: {
        level: 'info',
        file_dir: '',
    },
};

/**
 * Source URLs to resolve, one per configured repository. IDs are passed through as is.
 */
export function repositorySources(config: AnalyzerConfig): string[] {
    return config.repositories.map((repository) => repository.url ?? String(repository.id));
}

export function internalPatterns(config: AnalyzerConfig): string[] {
    return [...config.internal.patterns, ...config.internal.domains];
}
