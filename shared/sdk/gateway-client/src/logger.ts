import * as winston from 'winston';

export type Logger = winston.Logger;

export const logger: Logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.json(),
    defaultMeta: { service: process.env.SERVICE_NAME || 'tool-gateway-client' },
    silent: process.env.NODE_ENV === 'test',
    transports: [
        new winston.transports.Console()
    ]
});
