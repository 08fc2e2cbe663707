// src/controllers/SettingsController.ts
import { BadRequestError, ValidationError } from 'App/errors/CustomError';
import type { MonitorService } from 'App/services/MonitorService';
import { Category, CATEGORY_ORDER } from 'App/types/metrics';
import { validationErrorType } from 'App/types/errorType';
import { NextFunction, Request, Response } from 'express';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toInteger = (value: unknown): number | null => {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isInteger(n) ? n : null;
  }
  return null;
};

/**
 * Reads per-category seconds from a JSON or form body. Keys that are not
 * categories are ignored; range clamping is left to the refresh policy.
 */
export const parseIntervalPayload = (body: unknown): Partial<Record<Category, number>> => {
  if (!isRecord(body)) throw new BadRequestError('Expected an object of per-category intervals');

  const values: Partial<Record<Category, number>> = {};
  const details: validationErrorType[] = [];

  for (const category of CATEGORY_ORDER) {
    if (!(category in body)) continue;
    const n = toInteger(body[category]);
    if (n === null) {
      details.push({ field: category, message: 'must be an integer number of seconds' });
    } else {
      values[category] = n;
    }
  }

  if (details.length > 0) throw new ValidationError('Invalid refresh intervals', details);
  if (Object.keys(values).length === 0) {
    throw new ValidationError('No refresh intervals supplied', [
      { field: 'body', message: `expected one of: ${CATEGORY_ORDER.join(', ')}` },
    ]);
  }
  return values;
};

export class SettingsController {
  constructor(private readonly monitor: MonitorService) {}

  /**
   * POST /update_intervals
   * Body: { cpu?: int, memory?: int, ... } seconds. Answers 204 with no content.
   */
  update = (req: Request, res: Response, next: NextFunction) => {
    try {
      const applied = this.monitor.updateIntervals(parseIntervalPayload(req.body));
      console.log(`[Settings] Refresh intervals updated: ${JSON.stringify(applied)}`);
      return res.status(204).end();
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /api/intervals
   * Current interval and allowed range per category.
   */
  list = (req: Request, res: Response) =>
    res.status(200).json({ success: true, data: this.monitor.policy.describe() });
}
