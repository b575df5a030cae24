import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

// Define log format
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(({ timestamp, level, message, stack }) => {
        return stack
            ? `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`
            : `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
);

/**
 * Narrow an arbitrary string (env var, config value) to a known level
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

// Create the logger
const logger = winston.createLogger({
    level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
    format: logFormat,
    transports: [
        // Console output
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
                winston.format.printf(({ timestamp, level, message }) => {
                    return `${timestamp} ${level}: ${message}`;
                })
            ),
        }),
    ],
});

let fileLoggingDir: string | null = null;

/**
 * Change the level of every subsequent log call, from anywhere in the process
 */
export function setLogLevel(level: LogLevel): void {
    logger.level = level;
}

/**
 * Add rotating file output under the given directory. Calling it again is a no-op.
 */
export function enableFileLogging(logsDir: string): void {
    if (fileLoggingDir !== null) {
        return;
    }

    if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
    }

    logger.add(
        new DailyRotateFile({
            filename: path.join(logsDir, 'dependency-matrix-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles: '14d',
            format: logFormat,
        })
    );
    // Error log
    logger.add(
        new winston.transports.File({
            filename: path.join(logsDir, 'error.log'),
            level: 'error',
            format: logFormat,
        })
    );
    fileLoggingDir = logsDir;
}

/**
 * Render an unknown thrown value for a log line
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export default logger;
