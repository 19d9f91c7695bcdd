import { z } from 'zod';
import { config as loadDotenvFile } from 'dotenv';
import { isValid, parseISO } from 'date-fns';

// 日期验证：格式正确且为有效日期（如 2024-02-30 无效）
const dateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine((val) => isValid(parseISO(val)), { message: 'Invalid date' });

const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    BACKTEST_START: dateSchema.default('2018-01-01'),
    BACKTEST_END: dateSchema.default('2023-12-31'),
    MARKET_DATA_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    REPORT_CURRENCY: z.string().trim().min(1).default('THB'),
    REPORT_RECENT_MONTHS: z.coerce.number().int().min(0).default(12),
  })
  .refine((env) => env.BACKTEST_START <= env.BACKTEST_END, {
    message: 'BACKTEST_START must be <= BACKTEST_END',
    path: ['BACKTEST_START'],
  });

export type AppConfig = {
  nodeEnv: string;
  backtestStart: string;
  backtestEnd: string;
  marketDataTimeoutMs: number;
  reportCurrency: string;
  reportRecentMonths: number;
};

/**
 * 加载 .env.local / .env（已存在的环境变量优先）
 */
export function loadEnvFiles(): void {
  loadDotenvFile({ path: '.env.local' });
  loadDotenvFile({ path: '.env' });
}

/**
 * 解析配置；缺省值见 .env.example
 */
export function getConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    backtestStart: e.BACKTEST_START,
    backtestEnd: e.BACKTEST_END,
    marketDataTimeoutMs: e.MARKET_DATA_TIMEOUT_MS,
    reportCurrency: e.REPORT_CURRENCY,
    reportRecentMonths: e.REPORT_RECENT_MONTHS,
  };
}

/**
 * 统一的生产环境判断
 */
export function isProduction(env: Record<string, string | undefined> = process.env): boolean {
  return env.NODE_ENV === 'production';
}
