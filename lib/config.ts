/**
 * Agent configuration from environment variables.
 *
 * `loadEnvFiles()` pulls .env.local then .env into process.env (earlier
 * files win); `loadConfig()` parses whichever env it is given.
 */

import path from 'path';
import { config as loadDotenv } from 'dotenv';
import { ConfigError } from '@/lib/errors';
import { isLogLevel, type LogLevel } from '@/lib/logging/bot-logger';

export interface AgentConfig {
    dataDir: string;
    initialBankroll: number;
    dailyLossLimit: number;
    maxExposurePct: number;
    minTradeUsd: number;
    dryRun: boolean;
    scanIntervalSeconds: number;
    reconcileIntervalSeconds: number;
    optimizeEveryCycles: number;
    retryMaxAttempts: number;
    retryMaxAgeSeconds: number;
    exchangeApiBaseUrl: string;
    exchangeApiKey: string;
    signalFeedUrl: string;
    logLevel: LogLevel;
    /** Log sink; both set or logs stay on the console only. */
    supabaseUrl: string;
    supabaseServiceRoleKey: string;
}

type Env = Record<string, string | undefined>;

export function loadEnvFiles(cwd = process.cwd()): void {
    loadDotenv({ path: path.resolve(cwd, '.env.local') });
    loadDotenv({ path: path.resolve(cwd, '.env') });
}

export function loadConfig(env: Env = process.env): AgentConfig {
    const dryRun = bool(env, 'DRY_RUN', true);
    const exchangeApiBaseUrl = str(env, 'EXCHANGE_API_BASE_URL', '');
    const exchangeApiKey = str(env, 'EXCHANGE_API_KEY', '');

    if (!dryRun && (!exchangeApiBaseUrl || !exchangeApiKey)) {
        throw new ConfigError('Live trading (DRY_RUN=false) needs EXCHANGE_API_BASE_URL and EXCHANGE_API_KEY');
    }

    const logLevel = str(env, 'LOG_LEVEL', 'info').toLowerCase();
    if (!isLogLevel(logLevel)) {
        throw new ConfigError(`LOG_LEVEL must be one of trace, debug, info, warn, error; got "${logLevel}"`);
    }

    return {
        dataDir: path.resolve(str(env, 'DATA_DIR', './data')),
        initialBankroll: num(env, 'INITIAL_BANKROLL', 100, { min: 0, exclusiveMin: true }),
        dailyLossLimit: num(env, 'DAILY_LOSS_LIMIT', 0.2, { min: 0, max: 1 }),
        maxExposurePct: num(env, 'MAX_EXPOSURE_PCT', 0.5, { min: 0, max: 1, exclusiveMin: true }),
        minTradeUsd: num(env, 'MIN_TRADE_USD', 1, { min: 0 }),
        dryRun,
        scanIntervalSeconds: num(env, 'SCAN_INTERVAL_SECONDS', 300, { min: 0, exclusiveMin: true }),
        reconcileIntervalSeconds: num(env, 'RECONCILE_INTERVAL_SECONDS', 300, { min: 0, exclusiveMin: true }),
        optimizeEveryCycles: num(env, 'OPTIMIZE_EVERY_CYCLES', 12, { min: 1, integer: true }),
        retryMaxAttempts: num(env, 'RETRY_MAX_ATTEMPTS', 10, { min: 1, integer: true }),
        retryMaxAgeSeconds: num(env, 'RETRY_MAX_AGE_SECONDS', 600, { min: 0, exclusiveMin: true }),
        exchangeApiBaseUrl,
        exchangeApiKey,
        signalFeedUrl: str(env, 'SIGNAL_FEED_URL', ''),
        logLevel,
        supabaseUrl: str(env, 'SUPABASE_URL', ''),
        supabaseServiceRoleKey: str(env, 'SUPABASE_SERVICE_ROLE_KEY', ''),
    };
}

// ── Parsers ──

function str(env: Env, key: string, fallback: string): string {
    const value = env[key]?.trim();
    return value ? value : fallback;
}

function bool(env: Env, key: string, fallback: boolean): boolean {
    const value = env[key]?.trim().toLowerCase();
    if (!value) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(value)) return true;
    if (['0', 'false', 'no', 'off'].includes(value)) return false;
    throw new ConfigError(`${key} must be true or false; got "${env[key]}"`);
}

interface NumberRule {
    min?: number;
    max?: number;
    exclusiveMin?: boolean;
    integer?: boolean;
}

function num(env: Env, key: string, fallback: number, rule: NumberRule = {}): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;

    const value = Number(raw);
    const tooLow = rule.min !== undefined && (rule.exclusiveMin ? value <= rule.min : value < rule.min);
    const tooHigh = rule.max !== undefined && value > rule.max;
    if (!Number.isFinite(value) || tooLow || tooHigh || (rule.integer && !Number.isInteger(value))) {
        throw new ConfigError(`${key} is not a valid ${rule.integer ? 'integer' : 'number'}: "${raw}"`);
    }
    return value;
}
