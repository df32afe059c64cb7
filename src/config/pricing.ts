import { parseLogLevel, type LogLevel } from '../lib/logger.js';

/**
 * Runtime configuration, read from the environment with defaults
 */
export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  cartTtlMs: number;
  sweepIntervalMs: number;
  sweepScanLimit: number;
  sweepBudgetMs: number;
  shippingQuoteTtlMs: number;
  defaultCurrency: string;
  taxRateBps: number;
  taxJurisdiction: string;
  domesticCountry: string;
  domesticShippingFee: number;
  internationalShippingFee: number;
  freeShippingThreshold: number;
}

function int(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw ?? '', 10);
  return Number.isSafeInteger(value) && value >= 0 ? value : fallback;
}

function str(raw: string | undefined, fallback: string): string {
  const value = (raw ?? '').trim();
  return value || fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: int(env.PORT, 3000),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    cartTtlMs: int(env.CART_TTL_MS, 900_000), // 15 min
    sweepIntervalMs: int(env.SWEEP_INTERVAL_MS, 60_000),
    sweepScanLimit: int(env.SWEEP_SCAN_LIMIT, 100),
    sweepBudgetMs: int(env.SWEEP_BUDGET_MS, 50),
    shippingQuoteTtlMs: int(env.SHIPPING_QUOTE_TTL_MS, 300_000), // 5 min
    defaultCurrency: str(env.DEFAULT_CURRENCY, 'JPY').toUpperCase(),
    taxRateBps: int(env.TAX_RATE_BPS, 1000), // 10%
    taxJurisdiction: str(env.TAX_JURISDICTION, 'JP'),
    domesticCountry: str(env.DOMESTIC_COUNTRY, 'JP').toUpperCase(),
    domesticShippingFee: int(env.DOMESTIC_SHIPPING_FEE, 800),
    internationalShippingFee: int(env.INTERNATIONAL_SHIPPING_FEE, 3500),
    freeShippingThreshold: int(env.FREE_SHIPPING_THRESHOLD, 11_000),
  };
}
