import express, {type Express} from 'express';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import {requestLogger} from './middleware/logger';
import {errorHandler, notFoundHandler} from './middleware/errorHandler';
import {register} from './metrics';
import {QuakeController} from './controllers/quakeController';
import {createQuakeRouter} from './routes/quakeRoutes';
import type {QuakeService} from './services/quakeService';

export const createApp = (quakeService: QuakeService): Express => {
    const app = express();

    app.use(helmet());
    app.use(compression());
    app.use(rateLimit({windowMs: 15 * 60 * 1000, limit: 100}));  // basic rate limiting
    app.use(requestLogger);

    // Health check endpoint
    app.get('/health', (_, res) => {
        res.status(200).json({
            status: 'healthy',
            feedLoaded: quakeService.isLoaded(),
            timestamp: new Date().toISOString()
        });
    });

    // Metrics endpoint
    app.get('/metrics', async (_, res, next) => {
        try {
            res.set('Content-Type', register.contentType);
            res.end(await register.metrics());
        } catch (error) {
            next(error);
        }
    });

    // API routes
    app.use('/api/quakes', createQuakeRouter(new QuakeController(quakeService)));

    // Error handling
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
};
