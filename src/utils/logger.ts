import winston from 'winston';
import { toJson } from './json.js';

export const createLogger = (level: string = 'info', label?: string): winston.Logger => {
    return winston.createLogger({
        level,
        silent: process.env.NODE_ENV === 'test',
        format: winston.format.combine(
            winston.format.label({ label: label || 'hashrig' }),
            winston.format.timestamp(),
            winston.format.printf(({ timestamp, level, label, message, ...meta }) =>
                `${timestamp} [${label}] ${level}: ${message} ${Object.keys(meta).length ? toJson(meta) : ''}`
            )
        ),
        transports: [new winston.transports.Console()],
    });
};
