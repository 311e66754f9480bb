import type {Request, Response, NextFunction} from 'express';
import {logger} from './logger';
import {config} from '../config';
import type {ApiResponse} from '../types';
import {AppError} from '../utils/errors';

export const errorHandler = (
    error: Error,
    req: Request,
    res: Response<ApiResponse & {stack?: string}>,
    // Express recognises error middleware by its four parameters
    _next: NextFunction
): void => {
    const statusCode = error instanceof AppError ? error.statusCode : 500;
    const message = error.message || 'Internal Server Error';

    logger.error({
        message: error.message,
        error: error.name,
        stack: error.stack,
        url: req.url,
        method: req.method,
        statusCode
    });

    res.status(statusCode).json({
        success: false,
        error: message,
        ...(config.nodeEnv === 'development' && {stack: error.stack})
    });
};

const QUAKE_ENDPOINTS = [
    '/api/quakes/summary',
    '/api/quakes/records',
    '/api/quakes/yearly/average',
    '/api/quakes/yearly/count',
    '/api/quakes/charts/:chartId'
];

export const notFoundHandler = (req: Request, res: Response<ApiResponse>): void => {
    res.status(404).json({
        success: false,
        error: `Route ${req.originalUrl} not found`,
        message: `Earthquake endpoints: ${QUAKE_ENDPOINTS.join(', ')}`
    });
};
