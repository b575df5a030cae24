import { AnalysisResult } from '../models/AnalysisResult';
import { Dependency } from '../models/Dependency';
import { Language } from '../models/Language';
import { Project } from '../models/Project';
import { Repository } from '../models/Repository';
import { SourceControlClient } from '../gitlab/SourceControlClient';
import { RepositoryScanner } from '../scanner/RepositoryScanner';
import { DependencyExtractor } from '../parser/DependencyExtractor';
import { DependencyClassifier } from '../classifier/DependencyClassifier';
import { ReportGenerator } from '../reporter/ReportGenerator';
import { runBounded, runConcurrent } from '../utils/concurrency';
import logger, { describeError } from '../utils/logger';

export const DEFAULT_PROJECT_WORKERS = 5;
export const DEFAULT_FILE_WORKERS = 3;
export const DEFAULT_CLASSIFICATION_THRESHOLD = 10;

/**
 * Analysis state
 */
export type AnalysisState = 'INIT' | 'RESOLVE' | 'SCAN' | 'PROCESS' | 'REPORT' | 'COMPLETE' | 'FAILED';

export type AnalysisPhase = Exclude<AnalysisState, 'INIT' | 'COMPLETE' | 'FAILED'>;

export class AnalysisError extends Error {
    constructor(
        message: string,
        public readonly phase: AnalysisPhase,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AnalysisError';
    }
}

/**
 * The run was aborted (usually by the analysis timeout) before it produced a result
 */
export class AnalysisCancelledError extends Error {
    constructor(
        public readonly phase: AnalysisPhase,
        options?: { cause?: unknown }
    ) {
        super(`analysis incomplete: cancelled during ${phase.toLowerCase()} phase`, options);
        this.name = 'AnalysisCancelledError';
    }
}

export interface AnalysisCollaborators {
    client: SourceControlClient;
    scanner: RepositoryScanner;
    parser: DependencyExtractor;
    classifier: DependencyClassifier;
    reporter: ReportGenerator;
}

export interface OrchestratorOptions {
    repositoryWorkers?: number; // 0 scans every repository at once
    projectWorkers?: number;
    fileWorkers?: number;
    classificationThreshold?: number;
}

export interface ExecuteOptions {
    languageFilter?: Language;
    signal?: AbortSignal;
}

interface Counters {
    totalDependencies: number;
    internalCount: number;
    externalCount: number;
}

/**
 * Runs an analysis: resolve URLs to repositories, scan repositories for projects,
 * parse and classify each project's dependencies, then hand everything to the
 * report generator. Phases run strictly one after another; work inside a phase
 * runs concurrently.
 */
export class AnalysisOrchestrator {
    private readonly collaborators: AnalysisCollaborators;
    private readonly repositoryWorkers: number;
    private readonly projectWorkers: number;
    private readonly fileWorkers: number;
    private readonly classificationThreshold: number;
    private state: AnalysisState = 'INIT';

    constructor(collaborators: AnalysisCollaborators, options: OrchestratorOptions = {}) {
        this.collaborators = collaborators;
        this.repositoryWorkers = options.repositoryWorkers ?? 0;
        this.projectWorkers = options.projectWorkers ?? DEFAULT_PROJECT_WORKERS;
        this.fileWorkers = options.fileWorkers ?? DEFAULT_FILE_WORKERS;
        this.classificationThreshold = options.classificationThreshold ?? DEFAULT_CLASSIFICATION_THRESHOLD;
    }

    async execute(sourceUrls: readonly string[], options: ExecuteOptions = {}): Promise<AnalysisResult> {
        const { languageFilter, signal } = options;
        logger.info(`Starting dependency analysis of ${sourceUrls.length} source URL(s)`);

        try {
            this.setState('RESOLVE');
            const repositories = await this.resolveRepositories(sourceUrls, signal);

            this.setState('SCAN');
            let projects = await this.scanRepositories(repositories, signal);
            if (languageFilter) {
                const before = projects.length;
                projects = projects.filter((project) => project.language === languageFilter);
                logger.info(`Language filter ${languageFilter} kept ${projects.length} of ${before} project(s)`);
            }

            this.setState('PROCESS');
            const counters = await this.processProjects(projects, signal);

            this.setState('REPORT');
            await this.generateReport(projects, signal);

            const result: AnalysisResult = { totalProjects: projects.length, ...counters };
            this.setState('COMPLETE');
            logger.info(
                `Dependency analysis completed: ${result.totalProjects} projects, ` +
                    `${result.totalDependencies} dependencies (${result.internalCount} internal, ${result.externalCount} external)`
            );
            return result;
        } catch (error) {
            const phase = this.currentPhase();
            this.setState('FAILED');
            if (signal?.aborted) {
                throw new AnalysisCancelledError(phase, { cause: signal.reason });
            }
            throw error;
        }
    }

    getState(): AnalysisState {
        return this.state;
    }

    /**
     * One task per URL. The first failure fails the whole analysis.
     */
    private async resolveRepositories(sourceUrls: readonly string[], signal?: AbortSignal): Promise<Repository[]> {
        const resolved = await runBounded(
            sourceUrls,
            0,
            async (url) => {
                try {
                    return await this.collaborators.client.resolveRepositories(url, signal);
                } catch (error) {
                    throw new AnalysisError(
                        `failed to resolve repositories from ${url}: ${describeError(error)}`,
                        'RESOLVE',
                        { cause: error }
                    );
                }
            },
            signal
        );

        const repositories = resolved.flat();
        for (const repository of repositories) {
            logger.info(`Found repository ${repository.name} (${repository.url})`);
        }
        return repositories;
    }

    /**
     * A repository that cannot be scanned is logged and contributes no projects
     */
    private async scanRepositories(repositories: Repository[], signal?: AbortSignal): Promise<Project[]> {
        const scanned = await runBounded(
            repositories,
            this.repositoryWorkers,
            async (repository) => {
                try {
                    return await this.collaborators.scanner.detectProjects(repository, signal);
                } catch (error) {
                    signal?.throwIfAborted();
                    logger.error(`Failed to detect projects in repository ${repository.name}: ${describeError(error)}`);
                    return [];
                }
            },
            signal
        );

        const projects = scanned.flat();
        logger.info(`Detected ${projects.length} project(s) across ${repositories.length} repositories`);
        for (const project of projects) {
            logger.debug(
                `Project ${project.id} (${project.language}, path "${project.path}") with ${project.dependencyFiles.length} manifest file(s)`
            );
        }
        return projects;
    }

    private async processProjects(projects: Project[], signal?: AbortSignal): Promise<Counters> {
        logger.info(`Processing ${projects.length} project(s) with ${this.projectWorkers} workers`);
        const totals: Counters = { totalDependencies: 0, internalCount: 0, externalCount: 0 };

        await runConcurrent(
            projects,
            this.projectWorkers,
            async (project) => {
                const counters = await this.processProject(project, signal);
                totals.totalDependencies += counters.totalDependencies;
                totals.internalCount += counters.internalCount;
                totals.externalCount += counters.externalCount;
                logger.info(
                    `Completed project ${project.name}: ${counters.totalDependencies} dependencies ` +
                        `(${counters.internalCount} internal, ${counters.externalCount} external)`
                );
            },
            signal
        );

        return totals;
    }

    /**
     * Parse every manifest of a project through the file pool, merge the results in
     * manifest order, classify them and attach them to the project
     */
    private async processProject(project: Project, signal?: AbortSignal): Promise<Counters> {
        const files = project.dependencyFiles;
        let failedFiles = 0;

        const parsed = await runConcurrent(
            files,
            Math.min(this.fileWorkers, files.length),
            async (file) => {
                try {
                    return await this.collaborators.parser.parseFile(file, signal);
                } catch (error) {
                    signal?.throwIfAborted();
                    failedFiles++;
                    logger.error(`Failed to parse ${file.path} in ${project.name}: ${describeError(error)}`);
                    return [];
                }
            },
            signal
        );

        if (failedFiles > 0) {
            logger.warn(`${failedFiles} of ${files.length} manifest file(s) failed to parse in ${project.name}`);
        }

        const dependencies = parsed.flat();
        const counters = await this.classify(dependencies, signal);
        project.dependencies = dependencies;
        return counters;
    }

    /**
     * Small lists are classified in place; larger ones get one task per dependency
     */
    private async classify(dependencies: Dependency[], signal?: AbortSignal): Promise<Counters> {
        const { classifier } = this.collaborators;

        if (dependencies.length <= this.classificationThreshold) {
            classifier.classifyDependencies(dependencies);
        } else {
            await runBounded(
                dependencies,
                0,
                async (dependency) => {
                    dependency.isInternal = classifier.isInternal(dependency);
                },
                signal
            );
        }

        const internalCount = dependencies.filter((dependency) => dependency.isInternal).length;
        return {
            totalDependencies: dependencies.length,
            internalCount,
            externalCount: dependencies.length - internalCount,
        };
    }

    private async generateReport(projects: Project[], signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        logger.info(`Generating report for ${projects.length} project(s)`);
        try {
            const paths = await this.collaborators.reporter.generate(projects);
            logger.info(`Report written to ${paths.join(', ')}`);
        } catch (error) {
            throw new AnalysisError(`failed to generate report: ${describeError(error)}`, 'REPORT', { cause: error });
        }
    }

    private currentPhase(): AnalysisPhase {
        const state = this.state;
        return state === 'INIT' || state === 'COMPLETE' || state === 'FAILED' ? 'RESOLVE' : state;
    }

    private setState(state: AnalysisState): void {
        this.state = state;
        logger.info(`Analysis state: ${state}`);
    }
}
