import { z } from 'zod';
import { isValid, parse } from 'date-fns';

// 月份格式：YYYY-MM，且为有效月份（如 2024-13 无效）
export const monthSchema = z
  .string()
  .regex(/^\d{4}-\d{2}$/, { message: 'must be formatted as YYYY-MM' })
  .refine((val) => isValid(parse(val, 'yyyy-MM', new Date(0))), { message: 'Invalid month' });

export const monthlyReturnRecordSchema = z.object({
  month: monthSchema,
  returns: z.record(z.number().finite().min(-1, { message: 'return must be >= -1' })),
});

export const monthlyReturnsSchema = z.array(monthlyReturnRecordSchema);

export const allocationSchema = z
  .record(z.number().finite().min(0, { message: 'weight must be >= 0' }))
  .refine((val) => Object.keys(val).length > 0, { message: 'must not be empty' });

export const backtestInputSchema = z.object({
  monthlyReturns: monthlyReturnsSchema.min(1, { message: 'must not be empty' }),
  allocation: allocationSchema,
  initialCapital: z.number().finite().gt(0, { message: 'must be greater than 0' }),
  rebalanceFrequency: z
    .number()
    .int({ message: 'must be an integer' })
    .min(0, { message: 'must be >= 0 (0 = Buy & Hold)' }),
});

export type BacktestInput = z.infer<typeof backtestInputSchema>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'input'}: ${issue.message}`)
    .join('; ');
}
