/**
 * Option schemas shared by the engine entry points, the CLI and the HTTP
 * server. Everything is validated before the first write.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';
import { isValidDate, normalizeTimestamp } from './utils/date-time';
import { ACCESS_EVENT_TYPES } from '../types/models';

export const dateSchema = z.string().refine(isValidDate, {
  message: 'Expected a calendar date as YYYY-MM-DD',
});

export const timestampSchema = z.string().transform((value, ctx) => {
  const normalized = normalizeTimestamp(value);
  if (!normalized) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a timestamp as YYYY-MM-DDTHH:mm:ss' });
    return z.NEVER;
  }
  return normalized;
});

const idSchema = z.string().trim().min(1);

export const batchSizeSchema = z.number().int().positive();

function rangeInOrder(range: { fromDate?: string; toDate?: string }): boolean {
  return !range.fromDate || !range.toDate || range.fromDate <= range.toDate;
}

const RANGE_ORDER_ISSUE = { message: 'fromDate must not be after toDate', path: ['fromDate'] };

export const batchSelectorSchema = z
  .object({
    employeeId: idSchema.optional(),
    deviceId: idSchema.optional(),
    fromDate: dateSchema.optional(),
    toDate: dateSchema.optional(),
  })
  .refine(rangeInOrder, RANGE_ORDER_ISSUE);

export const rebuildRangeSchema = z
  .object({
    fromDate: dateSchema,
    toDate: dateSchema,
    employeeId: idSchema.optional(),
    departmentId: idSchema.optional(),
    batchSize: batchSizeSchema.optional(),
  })
  .refine(rangeInOrder, RANGE_ORDER_ISSUE);

/**
 * Either a single `date` or a complete `fromDate`/`toDate` range
 */
export const reprocessTargetSchema = z
  .object({
    employeeId: idSchema.optional(),
    date: dateSchema.optional(),
    fromDate: dateSchema.optional(),
    toDate: dateSchema.optional(),
  })
  .superRefine((target, ctx) => {
    const hasRange = target.fromDate !== undefined || target.toDate !== undefined;
    if (target.date !== undefined && hasRange) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Give either date or fromDate/toDate, not both', path: ['date'] });
    } else if (target.date === undefined && (target.fromDate === undefined || target.toDate === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Give a date or both fromDate and toDate', path: ['date'] });
    } else if (!rangeInOrder(target)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, ...RANGE_ORDER_ISSUE });
    }
  });

export const statsPeriodSchema = z
  .object({
    fromDate: dateSchema.optional(),
    toDate: dateSchema.optional(),
  })
  .refine(rangeInOrder, RANGE_ORDER_ISSUE);

export const cleanupOptionsSchema = z.object({
  olderThanDays: z.number().int().positive().optional(),
  keepAuditLogs: z.boolean().optional(),
  keepEvents: z.boolean().optional(),
  dryRun: z.boolean().optional(),
});

export const closeSessionsSchema = z.object({
  employeeId: idSchema.optional(),
  date: dateSchema.optional(),
  reason: z.string().trim().min(1, 'A reason is required'),
  closedBy: z.string().trim().min(1, 'closedBy is required'),
  closedAt: timestampSchema.optional(),
});

export const manualSessionSchema = z
  .object({
    employeeId: idSchema,
    startTime: timestampSchema,
    endTime: timestampSchema,
    reason: z.string().trim().min(1, 'A reason is required'),
    createdBy: z.string().trim().min(1, 'createdBy is required'),
  })
  .refine((session) => session.startTime <= session.endTime, {
    message: 'startTime must not be after endTime',
    path: ['endTime'],
  });

export const recordEventSchema = z.object({
  employeeId: idSchema.nullish(),
  deviceId: idSchema,
  cardNumber: z.string().trim().min(1).nullish(),
  eventType: z.enum(ACCESS_EVENT_TYPES),
  timestamp: timestampSchema,
  rawPayload: z.string().nullish(),
});

/**
 * Validate `value` or throw a ConfigurationError naming the first issue
 */
export function parseOptions<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  value: unknown,
  label: string
): Output {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.errors[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  throw new ConfigurationError(`Invalid ${label}: ${where}${issue?.message ?? 'unknown error'}`, {
    issues: parsed.error.errors.map((entry) => ({ path: entry.path.join('.'), message: entry.message })),
  });
}
