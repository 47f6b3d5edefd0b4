// src/utils/logger.ts
import winston from 'winston';
import config from '../config/index.js';

const { combine, timestamp, errors, printf, colorize } = winston.format;

const lineFormat = printf(({ level, message, timestamp: time, context, stack, ...meta }) => {
    const scope = context ? ` [${String(context)}]` : '';
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const trace = stack ? `\n${String(stack)}` : '';
    return `${String(time)} ${level}${scope}: ${String(message)}${extra}${trace}`;
});

/**
 * Root logger. Everything goes to stderr so that stdout stays reserved for
 * analysis output (CLI JSON, MCP stdio frames).
 */
export const logger = winston.createLogger({
    level: config.logLevel,
    format: combine(errors({ stack: true }), timestamp(), lineFormat),
    transports: [
        new winston.transports.Console({
            stderrLevels: Object.keys(winston.config.npm.levels),
            format: combine(colorize({ level: true }), errors({ stack: true }), timestamp(), lineFormat),
        }),
    ],
});

export function createContextLogger(context: string): winston.Logger {
    return logger.child({ context });
}
