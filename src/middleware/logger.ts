import type {Request, Response, NextFunction} from 'express';
import winston from 'winston';
import {config} from '../config';
import {httpRequests} from '../metrics';

export const logger = winston.createLogger({
    level: config.logLevel,
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({stack: true}),
        winston.format.splat()
    ),
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.printf(({timestamp, level, message, ...meta}) => {
                    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
                    return `${timestamp} ${level}: ${message}${extra}`;
                })
            )
        })
    ]
});

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
    const started = Date.now();

    res.on('finish', () => {
        httpRequests.inc({method: req.method, status: String(res.statusCode)});
        logger.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
    });

    next();
};
