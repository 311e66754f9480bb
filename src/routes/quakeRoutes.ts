import {Router} from 'express';
import type {QuakeController} from '../controllers/quakeController';
import {validateTimeZone} from '../middleware/validation';

export const createQuakeRouter = (quakeController: QuakeController): Router => {
    const router = Router();

    router.use(validateTimeZone);

    router.get('/summary', quakeController.getSummary);
    router.get('/records', quakeController.getRecords);
    router.get('/yearly/average', quakeController.getAverageMagnitude);
    router.get('/yearly/count', quakeController.getCountPerYear);
    router.get('/charts/:chartId', quakeController.getChart);

    return router;
};
