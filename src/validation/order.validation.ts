import { z } from 'zod';
import type { FieldError } from '@/utils/errorResponse';

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Accepts numbers and numeric strings only; `null` or booleans are rejected, not coerced. */
const numberLike = <T extends z.ZodTypeAny>(target: T) =>
  z.union([z.number(), z.string().trim().regex(NUMERIC, 'Expected a number')]).pipe(target);

/** True when the date does not roll over, e.g. 2025-02-30 is rejected. */
export function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

const neededBySchema = z.string().superRefine((value, ctx) => {
  const match = DATE_ONLY.exec(value);
  if (!match) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'neededBy must be a date in YYYY-MM-DD format' });
    return;
  }
  if (!isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'neededBy must be a real calendar date' });
  }
});

// Custom order request body schema
export const customOrderSchema = z.object({
  customerName: z.string().trim().min(1, 'Customer name is required').max(120),
  email: z.string().trim().email('A valid email address is required'),
  phone: z.string().trim().min(5).max(40).optional(),
  category: z.string().trim().min(1, 'Category is required').max(60),
  details: z.string().trim().min(1, 'Order details are required').max(2000),
  quantity: numberLike(z.coerce.number().int().min(1).max(1000)).default(1),
  neededBy: neededBySchema.optional(),
  budget: numberLike(z.coerce.number().nonnegative()).optional(),
});

export type CustomOrderBody = z.infer<typeof customOrderSchema>;

/**
 * Validates a custom order request body
 * @returns typed data, or one entry per invalid field
 */
export function validateCustomOrder(data: unknown): {
  success: true;
  data: CustomOrderBody;
} | {
  success: false;
  error: FieldError[];
} {
  const result = customOrderSchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}
