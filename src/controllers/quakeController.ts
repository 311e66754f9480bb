import type {Request, Response, NextFunction} from 'express';
import {config} from '../config';
import type {QuakeService} from '../services/quakeService';
import {CHART_IDS, isChartId, renderChartSvg} from '../services/chartService';
import type {ApiResponse} from '../types';
import type {QuakeRecord, QuakeReport, YearlySeries} from '../types/quake';

const timeZoneOf = (res: Response): string => {
    const timeZone: unknown = res.locals.timeZone;
    return typeof timeZone === 'string' ? timeZone : config.timeZone;
};

export class QuakeController {
    private readonly quakeService: QuakeService;

    constructor(quakeService: QuakeService) {
        this.quakeService = quakeService;
    }

    /**
     * Total count and strongest earthquake
     */
    getSummary = async (req: Request, res: Response<ApiResponse<QuakeReport>>, next: NextFunction): Promise<void> => {
        try {
            const report = await this.quakeService.report(timeZoneOf(res));
            res.status(200).json({success: true, data: report});
        } catch (error) {
            next(error);
        }
    };

    getRecords = async (req: Request, res: Response<ApiResponse<QuakeRecord[]>>, next: NextFunction): Promise<void> => {
        try {
            const records = await this.quakeService.records(timeZoneOf(res));
            res.status(200).json({success: true, data: records});
        } catch (error) {
            next(error);
        }
    };

    getAverageMagnitude = async (req: Request, res: Response<ApiResponse<YearlySeries>>, next: NextFunction): Promise<void> => {
        try {
            const series = await this.quakeService.averageSeries(timeZoneOf(res));
            res.status(200).json({success: true, data: series});
        } catch (error) {
            next(error);
        }
    };

    getCountPerYear = async (req: Request, res: Response<ApiResponse<YearlySeries>>, next: NextFunction): Promise<void> => {
        try {
            const series = await this.quakeService.countSeries(timeZoneOf(res));
            res.status(200).json({success: true, data: series});
        } catch (error) {
            next(error);
        }
    };

    /**
     * Render one chart as SVG
     */
    getChart = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const {chartId} = req.params;
            if (!isChartId(chartId)) {
                res.status(404).json({
                    success: false,
                    error: `Unknown chart ${chartId}, expected one of ${CHART_IDS.join(', ')}`
                });
                return;
            }

            const spec = await this.quakeService.chart(chartId, timeZoneOf(res));
            res.type('image/svg+xml').send(renderChartSvg(spec));
        } catch (error) {
            next(error);
        }
    };
}
