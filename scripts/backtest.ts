/**
 * Portfolio backtest CLI
 * 运行: npx tsx scripts/backtest.ts --risk medium --capital 100,000 --rebalance 12
 *
 * Flags:
 *   --risk <low|medium|high>              risk level, or
 *   --score <age,horizon,income,exp,dd>   questionnaire answers scored into a level
 *   --capital <amount>                    initial capital ("100,000" accepted)
 *   --rebalance <months>                  0 = Buy & Hold, 1, 6, 12, or any N
 *   --returns <file.json>                 MonthlyReturnRecord[]; skips Yahoo Finance
 *   --buy                                 mock-buy the allocation at the latest Yahoo close
 */

import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { getConfig, isProduction, loadEnvFiles } from '@/lib/env';
import { parseInitialCapital } from '@/lib/validation';
import { runBacktest } from '@/modules/backtest/engine';
import { InvalidInputError, isBacktestError } from '@/modules/backtest/errors';
import { getRebalanceLabel, parseRebalanceFrequency } from '@/modules/backtest/options';
import { renderReport } from '@/modules/backtest/report';
import { formatZodIssues, monthlyReturnsSchema } from '@/modules/backtest/schema';
import type { Allocation, MonthlyReturnRecord } from '@/modules/backtest/types';
import { getAllocation, parseRiskLevel, riskLevelLabel } from '@/modules/profile/allocation';
import { calculateRiskScore, determineRiskLevel } from '@/modules/profile/risk';
import type { RiskLevel } from '@/modules/profile/types';
import { toMonthlyPrices, toMonthlyReturns } from '@/modules/stocks/monthly';
import { Portfolio } from '@/modules/portfolio/portfolio';
import { executeTrade } from '@/modules/portfolio/trading';
import { fetchDailySeries, fetchLatestPrice } from '@/modules/stocks/providers';

function resolveRiskLevel(risk: string | undefined, score: string | undefined): RiskLevel {
  if (risk) return parseRiskLevel(risk);
  if (!score) {
    throw new InvalidInputError('Either --risk or --score is required');
  }

  const parts = score.split(',').map((s) => Number(s.trim()));
  if (parts.length !== 5) {
    throw new InvalidInputError('--score takes 5 comma-separated answers: age,horizon,income,experience,reaction');
  }
  const [age, investmentHorizonYears, incomeStability, investmentExperience, reactionToDrawdown] = parts;
  const total = calculateRiskScore({
    age,
    investmentHorizonYears,
    incomeStability,
    investmentExperience,
    reactionToDrawdown,
  });
  const level = determineRiskLevel(total);
  console.log(`Risk score: ${total}`);
  return level;
}

async function loadReturnsFile(path: string): Promise<MonthlyReturnRecord[]> {
  const text = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new InvalidInputError(`${path} is not valid JSON: ${String(err)}`);
  }
  const parsed = monthlyReturnsSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidInputError(`${path}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

async function fetchMonthlyReturns(
  allocation: Allocation,
  start: string,
  end: string,
  timeoutMs: number
): Promise<MonthlyReturnRecord[]> {
  const series = await fetchDailySeries({ symbols: Object.keys(allocation), start, end, timeoutMs });
  const seriesBySymbol = Object.fromEntries(series.map((s) => [s.symbol, s.points]));
  return toMonthlyReturns(toMonthlyPrices(seriesBySymbol));
}

async function main(): Promise<void> {
  loadEnvFiles();
  const config = getConfig();

  const { values } = parseArgs({
    options: {
      risk: { type: 'string' },
      score: { type: 'string' },
      capital: { type: 'string' },
      rebalance: { type: 'string', default: '0' },
      returns: { type: 'string' },
      buy: { type: 'boolean', default: false },
    },
  });

  const riskLevel = resolveRiskLevel(values.risk, values.score);
  const allocation = getAllocation(riskLevel);
  if (!values.capital) {
    throw new InvalidInputError('--capital is required');
  }
  const initialCapital = parseInitialCapital(values.capital);
  const rebalanceFrequency = parseRebalanceFrequency(values.rebalance ?? '0');
  const strategyName = getRebalanceLabel(rebalanceFrequency);

  console.log(`Your Risk Level: ${riskLevelLabel(riskLevel)}`);
  console.log('Recommended Allocation:');
  for (const [symbol, weight] of Object.entries(allocation).sort(([a], [b]) => a.localeCompare(b))) {
    console.log(`  ${symbol}: ${(weight * 100).toFixed(0)}%`);
  }
  console.log(`Rebalance Frequency: ${strategyName}`);
  console.log('');

  const monthlyReturns = values.returns
    ? await loadReturnsFile(values.returns)
    : await fetchMonthlyReturns(allocation, config.backtestStart, config.backtestEnd, config.marketDataTimeoutMs);

  console.log(`[backtest] Running ${monthlyReturns.length} months...`);
  const result = runBacktest(monthlyReturns, allocation, initialCapital, rebalanceFrequency);

  for (const line of renderReport(result, {
    strategyName,
    currency: config.reportCurrency,
    recentMonths: config.reportRecentMonths,
  })) {
    console.log(line);
  }

  if (values.buy) {
    const portfolio = new Portfolio(initialCapital);
    await executeTrade(portfolio, allocation, (symbol) =>
      fetchLatestPrice(symbol, { timeoutMs: config.marketDataTimeoutMs })
    );
    console.log('');
    console.log('[ Initial Purchase ]');
    for (const [symbol, units] of Object.entries(portfolio.holdings)) {
      console.log(`  ${symbol}: ${units.toFixed(4)} units`);
    }
    console.log(`  Cash left: ${portfolio.cash.toFixed(2)} ${config.reportCurrency}`);
  }
}

main().catch((err: unknown) => {
  if (isBacktestError(err)) {
    console.error(`[backtest] ${err.name}: ${err.message}`);
  } else if (isProduction()) {
    console.error(`[backtest] Unexpected error: ${String(err)}`);
  } else {
    console.error('[backtest] Unexpected error:', err);
  }
  process.exit(1);
});
