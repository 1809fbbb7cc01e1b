import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { LOG_FILE } from '../config';

// Ensure logs directory exists
const logFile = path.join(process.cwd(), LOG_FILE);
const logsDir = path.dirname(logFile);
if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
}

// Define log format
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
        return `${timestamp} [${level.toUpperCase()}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta, null, 2) : ''
            }`;
    })
);

// Console output stays quiet unless --verbose; the file always gets everything at LOG_LEVEL
const consoleTransport = new winston.transports.Console({
    level: 'error',
    stderrLevels: ['error', 'warn'],
    format: winston.format.combine(
        winston.format.colorize(),
        logFormat
    ),
});

// Create the logger
const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    transports: [
        consoleTransport,
        // File transport for all logs
        new winston.transports.File({
            filename: logFile,
            maxsize: 10485760, // 10MB
            maxFiles: 5,
        }),
        // Separate file for errors
        new winston.transports.File({
            filename: path.join(logsDir, 'error.log'),
            level: 'error',
        }),
    ],
});

/**
 * Verbose mode mirrors debug output on the console.
 */
export function setVerbose(verbose: boolean): void {
    if (verbose) {
        logger.level = 'debug';
        consoleTransport.level = 'debug';
    } else {
        consoleTransport.level = 'error';
    }
}

export default logger;
