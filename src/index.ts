/**
 * One-shot earthquake report.
 *
 * Usage:
 *   npm run report               # fetch the feed, save the snapshot, write charts
 *   npm run report -- --offline  # read the saved snapshot instead of the feed
 */

import path from 'path';
import {config} from './config';
import {FeedClient} from './clients/feedClient';
import {logger} from './middleware/logger';
import {CHART_IDS, renderChartSvg} from './services/chartService';
import {QuakeService} from './services/quakeService';
import {writeTextFile} from './utils/fileUtils';

export async function runReport(service: QuakeService, timeZone: string, chartDir: string): Promise<string[]> {
    const report = await service.report(timeZone);
    const {longitude, latitude} = report.strongest.location;
    logger.info(`Loaded ${report.count}`);
    logger.info(`The strongest earthquake was at (${longitude}, ${latitude}) with magnitude ${report.strongest.magnitude}`);

    const written: string[] = [];
    for (const id of CHART_IDS) {
        const file = path.join(chartDir, `${id}.svg`);
        await writeTextFile(file, renderChartSvg(await service.chart(id, timeZone)));
        written.push(file);
    }
    logger.info(`Charts written to ${chartDir}`);
    return written;
}

async function main(): Promise<void> {
    const service = new QuakeService({
        client: new FeedClient(),
        query: config.feedQuery,
        snapshotPath: config.snapshotPath,
        saveSnapshot: config.saveSnapshot,
        offline: config.offline || process.argv.includes('--offline')
    });
    await runReport(service, config.timeZone, config.chartDir);
}

if (require.main === module) {
    main().then(() => {
        process.exit(0);
    }).catch(error => {
        logger.error('Report failed:', error);
        process.exit(1);
    });
}
