/**
 * Sync CLI arguments
 * Layer: Entry Point (CLI)
 *
 *   --test-mode                        one window, capped sessions, debug logs
 *   --test-mode-limit-sessions <int>   cap for --test-mode (default 200)
 *   --start-dt <YYYY-MM-DD>            first day to sync
 *   --stop-dt <YYYY-MM-DD>             day after the last one to sync
 *   --load-to <db|json|v8>             sink (default: db when DATABASE_URL is set)
 */
import { calendarDate } from '@application/planning/WindowPlanner';
import { DEFAULT_TEST_MODE_LIMIT } from '@application/services/SyncService';
import type { LoadTarget } from '@core/config';
import { ValidationError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

export interface SyncCliOptions {
  testMode: boolean;
  testModeLimitSessions: number;
  startDt?: string;
  stopDt?: string;
  loadTo: LoadTarget;
}

const cliDate = z
  .string()
  .refine((value) => calendarDate(value) !== null, { message: 'expected a YYYY-MM-DD date' });

const cliSchema = z.object({
  testMode: z.boolean(),
  testModeLimitSessions: z.coerce.number().int().min(1).default(DEFAULT_TEST_MODE_LIMIT),
  startDt: cliDate.optional(),
  stopDt: cliDate.optional(),
  loadTo: z.enum(['db', 'json', 'v8']),
});

export function parseSyncArgs(args: readonly string[], defaultLoadTo: LoadTarget): SyncCliOptions {
  function getArg(flag: string): string | undefined {
    const idx = args.indexOf(flag);
    return idx !== -1 && args[idx + 1] && !args[idx + 1].startsWith('--') ? args[idx + 1] : undefined;
  }

  const hasFlag = (flag: string): boolean => args.includes(flag);

  const parsed = cliSchema.safeParse({
    testMode: hasFlag('--test-mode'),
    testModeLimitSessions: getArg('--test-mode-limit-sessions'),
    startDt: getArg('--start-dt'),
    stopDt: getArg('--stop-dt'),
    loadTo: getArg('--load-to') ?? defaultLoadTo,
  });

  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid arguments: ${messages.join('; ')}`);
  }
  return parsed.data;
}
