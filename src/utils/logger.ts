import { pino, type Logger } from 'pino';
import pretty from 'pino-pretty';

// stdout carries the formatted result, logs go to stderr
const stream = pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
    destination: 2,
    sync: true,
});

export const logger: Logger = pino({
    level: process.env.LOG_LEVEL || 'info',
}, stream);
