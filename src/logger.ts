import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfig, type LoggingConfig } from './config';

const { combine, timestamp, json, printf, colorize } = winston.format;

// one JSON document per line, one file per day: logs/2025-06-01_agent.log
export function rotationOptions(config: LoggingConfig): DailyRotateFile.DailyRotateFileTransportOptions {
    return {
        dirname: config.dir,
        filename: '%DATE%_agent.log',
        datePattern: 'YYYY-MM-DD',
        maxFiles: `${config.retentionDays}d`,
        zippedArchive: false,
        createSymlink: false,
        level: config.level,
        format: combine(timestamp(), json()),
    };
}

const consoleFormat = printf((info) => {
    const component = info.component ? ` ${info.component}` : '';
    return `${info.timestamp} | ${info.level}${component} | ${info.message}`;
});

export function createLogger(config: LoggingConfig): winston.Logger {
    const transports: winston.transport[] = [new DailyRotateFile(rotationOptions(config))];

    if (config.console) {
        transports.push(new winston.transports.Console({
            level: config.level,
            format: combine(colorize(), timestamp({ format: 'HH:mm:ss' }), consoleFormat),
        }));
    }

    return winston.createLogger({
        level: config.level,
        transports,
    });
}

let root: winston.Logger | null = null;

// no defaultMeta here: winston applies it over child metadata
export function getLogger(): winston.Logger {
    if (!root) root = createLogger(getConfig().logging).child({ component: 'agent' });
    return root;
}

export function childLogger(component: string): winston.Logger {
    return getLogger().child({ component });
}

export type Logger = winston.Logger;
