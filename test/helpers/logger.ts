import winston from 'winston';

export function silentLogger(): winston.Logger {
    return winston.createLogger({ silent: true });
}
