import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import logger, { describeError } from './logger';

export interface EnvLoadResult {
    loadedFrom: string[];
    tried: string[];
    errors: string[];
}

/**
 * Loads .env files (GITLAB_TOKEN and friends) from the places a user is
 * likely to keep them. Variables already set in the process win.
 */
export class EnvLoader {
    load(configPath?: string): EnvLoadResult {
        const tried: string[] = [];
        const loadedFrom: string[] = [];
        const errors: string[] = [];

        for (const candidate of this.buildCandidatePaths(configPath)) {
            if (tried.includes(candidate)) continue;
            tried.push(candidate);

            if (!fs.existsSync(candidate)) {
                continue;
            }

            const result = dotenv.config({ path: candidate });
            if (result.error) {
                const message = describeError(result.error);
                errors.push(message);
                logger.warn(`Failed to load env file ${candidate}: ${message}`);
                continue;
            }
            loadedFrom.push(candidate);
            logger.debug(`Loaded environment variables from ${candidate}`);
        }

        if (loadedFrom.length === 0) {
            logger.debug('No .env file found in any standard location');
        }

        return { loadedFrom, tried, errors };
    }

    private buildCandidatePaths(configPath?: string): string[] {
        const paths: string[] = [];

        // Next to the config file
        if (configPath) {
            paths.push(path.resolve(path.dirname(configPath), '.env'));
        }

        // Current working directory
        paths.push(path.resolve(process.cwd(), '.env'));

        // Package root (helpful when running from compiled dist)
        paths.push(path.resolve(__dirname, '../../.env'));

        // User-level override
        paths.push(path.join(os.homedir(), '.dependency-matrix.env'));

        return paths;
    }
}
