import type {Request, Response, NextFunction} from 'express';
import Joi from 'joi';
import {config} from '../config';
import type {ApiResponse} from '../types';
import {isValidTimeZone} from '../utils/timeUtils';

const timeZoneQuerySchema = Joi.object({
    timeZone: Joi.string().custom((value: string, helpers) => {
        if (!isValidTimeZone(value)) {
            return helpers.error('any.invalid');
        }
        return value;
    }).messages({
        'any.invalid': 'timeZone must be an IANA time zone such as UTC or Europe/London'
    })
}).unknown(true);

/**
 * Checks the optional `timeZone` query parameter and stores the zone to use
 * in `res.locals.timeZone`, falling back to the configured zone.
 */
export const validateTimeZone = (req: Request, res: Response<ApiResponse>, next: NextFunction): void => {
    const {error} = timeZoneQuerySchema.validate(req.query);

    if (error) {
        res.status(400).json({
            success: false,
            error: error.details[0].message
        });
        return;
    }

    const {timeZone} = req.query;
    res.locals.timeZone = typeof timeZone === 'string' ? timeZone : config.timeZone;
    next();
};
