import { AnalyzerConfig, internalPatterns, repositorySources } from './config/schema';
import { GitLabClient } from './gitlab/GitLabClient';
import { ProjectScanner } from './scanner/ProjectScanner';
import { DependencyParser } from './parser/DependencyParser';
import { PatternClassifier } from './classifier/PatternClassifier';
import { MatrixReportGenerator } from './reporter/MatrixReportGenerator';
import { AnalysisOrchestrator, ExecuteOptions } from './orchestrator/AnalysisOrchestrator';
import { AnalysisResult } from './models/AnalysisResult';
import logger from './utils/logger';

/**
 * Wire the GitLab-backed collaborators for a configuration
 */
export function createOrchestrator(config: AnalyzerConfig, client?: GitLabClient): AnalysisOrchestrator {
    const gitlab =
        client ??
        new GitLabClient({
            baseUrl: config.gitlab.base_url,
            token: config.gitlab.token,
            pageWorkers: config.concurrency.page_workers,
        });

    return new AnalysisOrchestrator(
        {
            client: gitlab,
            scanner: new ProjectScanner(gitlab),
            parser: new DependencyParser(),
            classifier: new PatternClassifier(internalPatterns(config)),
            reporter: new MatrixReportGenerator({
                htmlFile: config.output.html_file,
                title: config.output.title,
                formats: config.output.formats,
            }),
        },
        {
            repositoryWorkers: config.concurrency.repository_workers,
            projectWorkers: config.concurrency.project_workers,
            fileWorkers: config.concurrency.file_workers,
            classificationThreshold: config.concurrency.classification_threshold,
        }
    );
}

/**
 * Main entry point for programmatic usage
 */
export async function runAnalysis(config: AnalyzerConfig, options: ExecuteOptions = {}): Promise<AnalysisResult> {
    const client = new GitLabClient({
        baseUrl: config.gitlab.base_url,
        token: config.gitlab.token,
        pageWorkers: config.concurrency.page_workers,
    });

    // Fail fast on a bad token instead of once per repository
    await client.checkPermissions(options.signal);

    const sources = repositorySources(config);
    logger.info(`Analyzing ${sources.length} configured source(s)`);
    return await createOrchestrator(config, client).execute(sources, options);
}

export { ConfigLoader, ConfigError } from './config/ConfigLoader';
export { AnalyzerConfig, ReportFormat, DEFAULT_CONFIG } from './config/schema';
export { GitLabClient, GitLabError, GitLabErrorCategory } from './gitlab/GitLabClient';
export { SourceControlClient } from './gitlab/SourceControlClient';
export { ProjectScanner } from './scanner/ProjectScanner';
export { DependencyParser, UnsupportedManifestError, ManifestParseError } from './parser/DependencyParser';
export { parseConstraint } from './parser/VersionRange';
export { PatternClassifier } from './classifier/PatternClassifier';
export { MatrixReportGenerator, ReportError } from './reporter/MatrixReportGenerator';
export { AnalysisOrchestrator, AnalysisError, AnalysisCancelledError } from './orchestrator/AnalysisOrchestrator';
export { AnalysisResult } from './models/AnalysisResult';
export { Dependency, Ecosystem } from './models/Dependency';
export { Language, LANGUAGES } from './models/Language';
export { Project, DependencyFile } from './models/Project';
export { Repository } from './models/Repository';
