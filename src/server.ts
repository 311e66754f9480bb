import {config} from './config';
import {createApp} from './app';
import {FeedClient} from './clients/feedClient';
import {logger} from './middleware/logger';
import {QuakeService} from './services/quakeService';

process.on('unhandledRejection', err => {
    logger.error('UNHANDLED REJECTION:', err);
    process.exit(1);
});

const quakeService = new QuakeService({
    client: new FeedClient(),
    query: config.feedQuery,
    snapshotPath: config.snapshotPath,
    saveSnapshot: config.saveSnapshot,
    offline: config.offline
});

const app = createApp(quakeService);

app.listen(config.port, () => {
    logger.info(`Quake stats service is running on port ${config.port}`);
});
