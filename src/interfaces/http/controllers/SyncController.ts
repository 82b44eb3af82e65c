/**
 * Sync Controller: HTTP trigger for a sync run
 * Layer: Interfaces (HTTP)
 *
 * Thin: the body is already validated by `validateBody(syncRequestSchema)`,
 * the run itself belongs to SyncService. The service has no overlap control
 * of its own; this is the one place two runs can meet in one process, so a
 * trigger while a run is active is answered 409 here. A run that finishes
 * in the failed state is still a 200 with `status: 'failed'`: the request
 * was served, the result says what went wrong.
 */
import { DEFAULT_TEST_MODE_LIMIT, SyncService } from '@application/services/SyncService';
import { calendarDate } from '@application/planning/WindowPlanner';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { ConflictError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';
import { z } from 'zod/v4';

const syncDate = z
  .string()
  .refine((value) => calendarDate(value) !== null, { message: 'expected a YYYY-MM-DD date' });

export const syncRequestSchema = z
  .object({
    startDt: syncDate.optional(),
    stopDt: syncDate.optional(),
    testMode: z.boolean().default(false),
    testModeLimitSessions: z.number().int().min(1).default(DEFAULT_TEST_MODE_LIMIT),
  })
  .refine((body) => !body.startDt || !body.stopDt || body.startDt < body.stopDt, {
    message: 'startDt must be before stopDt',
    path: ['startDt'],
  });

export type SyncRequestBody = z.infer<typeof syncRequestSchema>;

export class SyncController {
  private service: SyncService;

  constructor() {
    this.service = container.resolve<SyncService>(TOKENS.SyncService);
  }

  trigger = async (req: Request, res: Response): Promise<void> => {
    if (this.service.isRunning) throw new ConflictError('A sync run is already in progress');
    const body: SyncRequestBody = req.body;
    const result = await this.service.run(body);

    const totalTimeMs =
      req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;

    res.status(200).json({
      status: result.status === 'done' ? 'success' : 'failed',
      data: result,
      ...(totalTimeMs != null && { meta: { totalTimeMs } }),
    });
  };

  watermark = async (_req: Request, res: Response): Promise<void> => {
    const watermark = await this.service.readWatermark();
    res.status(200).json({ watermark: watermark ? watermark.toISOString() : null });
  };

  status = (_req: Request, res: Response): void => {
    res.status(200).json({ state: this.service.state, running: this.service.isRunning });
  };
}
