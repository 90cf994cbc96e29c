import { z } from 'zod';
import { InvalidConfigurationError } from './errors';
import { parseUtcDay } from './dates';
import { logger } from './logger';

const utcDaySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date formatted as YYYY-MM-DD')
  .transform((value, ctx) => {
    const date = parseUtcDay(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a calendar date: ${value}` });
      return z.NEVER;
    }
    return date;
  });

export const symbolSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z0-9]+$/, 'Symbol must contain only letters and digits');

export const modeSchema = z.enum(['daily', 'monthly']);

export const syncRequestSchema = z
  .object({
    type: modeSchema,
    symbol: symbolSchema.default('BTCUSDT'),
    incremental: z.boolean().default(false),
    intervals: z.array(z.string().trim().min(1)).min(1).optional(),
    startDate: utcDaySchema.optional(),
    endDate: utcDaySchema.optional(),
  })
  .strict()
  .refine((data) => !data.startDate || !data.endDate || data.startDate.getTime() <= data.endDate.getTime(), {
    message: 'startDate must not be after endDate',
    path: ['startDate'],
  });

const positiveInt = z.coerce.number().int().min(1);

export const envConfigSchema = z.object({
  archiveBaseUrl: z.string().url(),
  dataRoot: z.string().min(1),
  logDir: z.string().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  nodeEnv: z.string().min(1),
  concurrency: positiveInt.max(64),
  maxAttempts: positiveInt.max(10),
  retryDelayMs: z.coerce.number().int().min(0),
  httpTimeoutMs: positiveInt,
  localIoErrorLimit: positiveInt,
  dailyCron: z.string().min(1),
  monthlyCron: z.string().min(1),
});

/**
 * Parse `input` with `schema`, converting the first issue into an
 * InvalidConfigurationError that names the offending field.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, context: string): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const errors = result.error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

  logger.warn('Validation', `${context} validation failed`, { errors });

  const [first] = errors;
  const field = first?.field || undefined;
  const message = first ? `${field ? `${field}: ` : ''}${first.message}` : `Invalid ${context}`;
  throw new InvalidConfigurationError(message, field, { errors });
}

export type SyncRequestInput = z.input<typeof syncRequestSchema>;
export type SyncRequest = z.output<typeof syncRequestSchema>;
export type EnvConfig = z.output<typeof envConfigSchema>;
