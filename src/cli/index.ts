#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { ConfigLoader } from '../config/ConfigLoader';
import { AnalyzerConfig } from '../config/schema';
import { runAnalysis } from '../index';
import { Language, LANGUAGES, isLanguage } from '../models/Language';
import { EnvLoader } from '../utils/EnvLoader';
import logger, { describeError, enableFileLogging, setLogLevel } from '../utils/logger';

const VERSION = '1.0.0';

export interface AnalyzeOptions {
    config: string;
    output?: string;
    title?: string;
    debug?: boolean;
    timeout?: number;
    language: string;
}

function parseMinutes(value: string): number {
    const minutes = Number(value);
    if (!Number.isInteger(minutes) || minutes <= 0) {
        throw new InvalidArgumentError('Must be a positive whole number of minutes.');
    }
    return minutes;
}

/**
 * The language to restrict the run to, or undefined for all of them
 */
export function parseLanguage(value: string): Language | undefined {
    if (value === 'all') {
        return undefined;
    }
    if (!isLanguage(value)) {
        throw new Error(`invalid language '${value}'. Supported languages: ${LANGUAGES.join(', ')}, all`);
    }
    return value;
}

/**
 * Apply CLI options to config
 */
export function applyCliOptions(config: AnalyzerConfig, options: AnalyzeOptions): AnalyzerConfig {
    if (options.output) {
        config.output.html_file = options.output;
    }
    if (options.title) {
        config.output.title = options.title;
    }
    if (options.timeout !== undefined) {
        config.timeout.analysis_timeout_minutes = options.timeout;
    }
    if (options.debug) {
        config.logging.level = 'debug';
    }
    return config;
}

/**
 * @returns the process exit code
 */
export async function analyzeAction(options: AnalyzeOptions): Promise<number> {
    try {
        const languageFilter = parseLanguage(options.language);

        new EnvLoader().load(options.config);
        const config = applyCliOptions(await new ConfigLoader().load(options.config), options);

        setLogLevel(config.logging.level);
        if (config.logging.file_dir) {
            enableFileLogging(config.logging.file_dir);
        }

        const minutes = config.timeout.analysis_timeout_minutes;
        console.log('Starting dependency matrix analysis...');
        console.log(languageFilter ? `Analyzing ${languageFilter} projects only` : 'Analyzing all languages');
        console.log(`Analysis timeout: ${minutes}m`);

        const result = await runAnalysis(config, {
            languageFilter,
            signal: AbortSignal.timeout(minutes * 60 * 1000),
        });

        console.log('\nAnalysis completed successfully!');
        console.log('Summary:');
        console.log(`  Total Projects: ${result.totalProjects}`);
        console.log(`  Total Dependencies: ${result.totalDependencies}`);
        console.log(`  Internal Dependencies: ${result.internalCount}`);
        console.log(`  External Dependencies: ${result.externalCount}`);
        console.log(`Report: ${config.output.html_file}`);
        return 0;
    } catch (error) {
        logger.error(`Analysis failed: ${describeError(error)}`);
        console.error(`Error: ${describeError(error)}`);
        return 1;
    }
}

const program = new Command();

program
    .name('dependency-matrix')
    .description('Analyze dependencies across GitLab repositories and render an internal/external matrix')
    .version(VERSION);

program
    .command('analyze')
    .description('Resolve the configured repositories, analyze their manifests and write the report')
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .option('-o, --output <file>', 'Output HTML file path (overrides config)')
    .option('-t, --title <title>', 'Report title (overrides config)')
    .option('-d, --debug', 'Enable debug logging')
    .option('--timeout <minutes>', 'Analysis timeout in minutes (overrides config)', parseMinutes)
    .option('-l, --language <language>', `Language to analyze (${LANGUAGES.join(', ')}, all)`, 'all')
    .action(async (options: AnalyzeOptions) => {
        process.exitCode = await analyzeAction(options);
    });

program
    .command('version')
    .description('Show version information')
    .action(() => {
        console.log(`dependency-matrix ${VERSION}`);
    });

// Only parse arguments if this module is run directly
if (require.main === module) {
    program.parseAsync().catch((error: unknown) => {
        console.error(`Error: ${describeError(error)}`);
        process.exitCode = 1;
    });
}

export { program };
