import yaml from 'js-yaml';
import { AnalyzerConfig, DEFAULT_CONFIG, RepositoryConfig, isReportFormat } from './schema';
import { fileExists, readFile } from '../utils/fileUtils';
import logger, { describeError, isLogLevel } from '../utils/logger';

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly field?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

type RawSection = Record<string, unknown>;

function isMapping(value: unknown): value is RawSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
    const value = raw[key];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isMapping(value)) {
        throw new ConfigError(`${key} must be a mapping`, key);
    }
    return value;
}

function readString(raw: RawSection, key: string, fallback: string, field: string): string {
    const value = raw[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    throw new ConfigError(`${field} must be a string`, field);
}

function readNumber(raw: RawSection, key: string, fallback: number, field: string): number {
    const value = raw[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    const parsed = typeof value === 'string' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
        throw new ConfigError(`${field} must be an integer`, field);
    }
    return parsed;
}

function readStringList(raw: RawSection, key: string, fallback: string[], field: string): string[] {
    const value = raw[key];
    if (value === undefined || value === null) {
        return [...fallback];
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new ConfigError(`${field} must be a list of strings`, field);
    }
    return value;
}

function isValidUrl(value: string): boolean {
    try {
        new URL(value);
        return true;
    } catch {
        return false;
    }
}

function readRepositories(raw: RawSection): RepositoryConfig[] {
    const value = raw.repositories;
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new ConfigError('repositories must be a list', 'repositories');
    }

    return value.map((entry: unknown, index) => {
        const field = `repositories[${index}]`;
        if (typeof entry === 'string') {
            return { url: entry };
        }
        if (!isMapping(entry)) {
            throw new ConfigError(`${field} must be a URL or a mapping`, field);
        }
        const repository: RepositoryConfig = {};
        const url = readString(entry, 'url', '', `${field}.url`).trim();
        if (url !== '') {
            repository.url = url;
        }
        const id = readNumber(entry, 'id', 0, `${field}.id`);
        if (id !== 0) {
            repository.id = id;
        }
        const name = readString(entry, 'name', '', `${field}.name`);
        if (name !== '') {
            repository.name = name;
        }
        return repository;
    });
}

/**
 * Load and validate configuration
 */
export class ConfigLoader {
    private configSource: string = '';

    /**
     * Read a YAML config file, fill in defaults, apply environment overrides and validate
     */
    async load(configPath: string): Promise<AnalyzerConfig> {
        if (!configPath) {
            throw new ConfigError('config path is required');
        }
        if (!(await fileExists(configPath))) {
            throw new ConfigError(`config file does not exist: ${configPath}`);
        }

        const raw = await this.loadFromFile(configPath);
        const config = this.mergeWithDefaults(raw);
        this.applyEnvironmentOverrides(config);
        this.validate(config);

        this.configSource = configPath;
        logger.info(`Configuration loaded successfully from: ${configPath}`);
        return config;
    }

    getConfigSource(): string {
        return this.configSource;
    }

    private async loadFromFile(filePath: string): Promise<RawSection> {
        let parsed: unknown;
        try {
            parsed = yaml.load(await readFile(filePath));
        } catch (error) {
            throw new ConfigError(`failed to read config file: ${describeError(error)}`, undefined, { cause: error });
        }

        if (parsed === undefined || parsed === null) {
            logger.warn(`Config file ${filePath} is empty, using defaults`);
            return {};
        }
        if (!isMapping(parsed)) {
            throw new ConfigError('config file must contain a YAML mapping');
        }
        logger.debug(`Loaded config from: ${filePath}`);
        return parsed;
    }

    /**
     * Merge with default configuration
     */
    private mergeWithDefaults(raw: RawSection): AnalyzerConfig {
        const gitlab = section(raw, 'gitlab');
        const internal = section(raw, 'internal');
        const output = section(raw, 'output');
        const timeout = section(raw, 'timeout');
        const concurrency = section(raw, 'concurrency');
        const logging = section(raw, 'logging');
        const defaults = DEFAULT_CONFIG;

        const formats = readStringList(output, 'formats', defaults.output.formats, 'output.formats');
        const level = readString(logging, 'level', defaults.logging.level, 'logging.level');
        if (!isLogLevel(level)) {
            throw new ConfigError(`logging.level must be one of error, warn, info, debug (got ${level})`, 'logging.level');
        }

        return {
            gitlab: {
                base_url: readString(gitlab, 'base_url', defaults.gitlab.base_url, 'gitlab.base_url'),
                token: readString(gitlab, 'token', defaults.gitlab.token, 'gitlab.token'),
            },
            repositories: readRepositories(raw),
            internal: {
                patterns: readStringList(internal, 'patterns', defaults.internal.patterns, 'internal.patterns'),
                domains: readStringList(internal, 'domains', defaults.internal.domains, 'internal.domains'),
            },
            output: {
                html_file: readString(output, 'html_file', defaults.output.html_file, 'output.html_file'),
                title: readString(output, 'title', defaults.output.title, 'output.title'),
                formats: formats.map((format) => {
                    if (!isReportFormat(format)) {
                        throw new ConfigError(`output.formats contains unsupported format: ${format}`, 'output.formats');
                    }
                    return format;
                }),
            },
            timeout: {
                analysis_timeout_minutes: readNumber(
                    timeout,
                    'analysis_timeout_minutes',
                    defaults.timeout.analysis_timeout_minutes,
                    'timeout.analysis_timeout_minutes'
                ),
            },
            concurrency: {
                page_workers: readNumber(
                    concurrency,
                    'page_workers',
                    defaults.concurrency.page_workers,
                    'concurrency.page_workers'
                ),
                repository_workers: readNumber(
                    concurrency,
                    'repository_workers',
                    defaults.concurrency.repository_workers,
                    'concurrency.repository_workers'
                ),
                project_workers: readNumber(
                    concurrency,
                    'project_workers',
                    defaults.concurrency.project_workers,
                    'concurrency.project_workers'
                ),
                file_workers: readNumber(
                    concurrency,
                    'file_workers',
                    defaults.concurrency.file_workers,
                    'concurrency.file_workers'
                ),
                classification_threshold: readNumber(
                    concurrency,
                    'classification_threshold',
                    defaults.concurrency.classification_threshold,
                    'concurrency.classification_threshold'
                ),
            },
            logging: {
                level,
                file_dir: readString(logging, 'file_dir', defaults.logging.file_dir, 'logging.file_dir'),
            },
        };
    }

    /**
     * Apply environment variable overrides
     */
    private applyEnvironmentOverrides(config: AnalyzerConfig): void {
        const env = process.env;

        if (env.GITLAB_BASE_URL) {
            config.gitlab.base_url = env.GITLAB_BASE_URL;
        }
        if (env.GITLAB_TOKEN) {
            config.gitlab.token = env.GITLAB_TOKEN;
        }
        if (env.OUTPUT_HTML_FILE) {
            config.output.html_file = env.OUTPUT_HTML_FILE;
        }
        if (env.OUTPUT_TITLE) {
            config.output.title = env.OUTPUT_TITLE;
        }
        if (env.ANALYSIS_TIMEOUT_MINUTES) {
            const minutes = Number(env.ANALYSIS_TIMEOUT_MINUTES);
            if (!Number.isInteger(minutes)) {
                throw new ConfigError(
                    `ANALYSIS_TIMEOUT_MINUTES must be an integer (got ${env.ANALYSIS_TIMEOUT_MINUTES})`,
                    'timeout.analysis_timeout_minutes'
                );
            }
            config.timeout.analysis_timeout_minutes = minutes;
        }
        if (env.LOG_LEVEL) {
            if (isLogLevel(env.LOG_LEVEL)) {
                config.logging.level = env.LOG_LEVEL;
            } else {
                logger.warn(`Ignoring unknown LOG_LEVEL ${env.LOG_LEVEL}`);
            }
        }
        if (env.LOG_DIR) {
            config.logging.file_dir = env.LOG_DIR;
        }
    }

    private validate(config: AnalyzerConfig): void {
        const fail = (problem: string, field: string): never => {
            throw new ConfigError(`config validation failed: ${problem}`, field);
        };

        if (config.gitlab.base_url === '') {
            fail('gitlab.base_url is required', 'gitlab.base_url');
        }
        if (!isValidUrl(config.gitlab.base_url)) {
            fail(`gitlab.base_url is not a valid URL: ${config.gitlab.base_url}`, 'gitlab.base_url');
        }
        if (config.gitlab.token === '') {
            fail('gitlab.token is required', 'gitlab.token');
        }
        if (config.repositories.length === 0) {
            fail('at least one repository must be configured', 'repositories');
        }
        if (config.output.html_file === '') {
            fail('output.html_file is required', 'output.html_file');
        }
        if (config.output.title === '') {
            fail('output.title is required', 'output.title');
        }

        config.repositories.forEach((repository, index) => {
            const hasId = repository.id !== undefined && repository.id > 0;
            if (repository.url === undefined && !hasId) {
                fail(`repository[${index}] must have either url or id specified`, `repositories[${index}]`);
            }
            if (repository.url !== undefined && hasId) {
                fail(`repository[${index}] should not have both url and id specified`, `repositories[${index}]`);
            }
        });

        config.internal.patterns.forEach((pattern, index) => {
            if (pattern === '') {
                fail(`internal.patterns[${index}] must not be empty`, `internal.patterns[${index}]`);
            }
        });
        config.internal.domains.forEach((domain, index) => {
            if (domain === '') {
                fail(`internal.domains[${index}] must not be empty`, `internal.domains[${index}]`);
            }
        });

        if (config.timeout.analysis_timeout_minutes <= 0) {
            fail('timeout.analysis_timeout_minutes must be positive', 'timeout.analysis_timeout_minutes');
        }

        const { concurrency } = config;
        for (const key of ['page_workers', 'project_workers', 'file_workers'] as const) {
            if (concurrency[key] < 1) {
                fail(`concurrency.${key} must be at least 1`, `concurrency.${key}`);
            }
        }
        if (concurrency.repository_workers < 0) {
            fail('concurrency.repository_workers must not be negative', 'concurrency.repository_workers');
        }
        if (concurrency.classification_threshold < 0) {
            fail('concurrency.classification_threshold must not be negative', 'concurrency.classification_threshold');
        }
    }
}
