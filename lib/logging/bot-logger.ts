/**
 * Structured logger for the trading agent.
 *
 * - run_id: correlates every log line of one agent process
 * - trace_id: correlates the lines of one strategy loop or one trade
 * - stage: which step of the pipeline emitted the line
 * - elapsed_ms: time since the trace started
 *
 * Console output always. When a Supabase client is supplied, each line is
 * also written to the `agent_logs` table without blocking the caller.
 *
 * Stages:
 *   AGENT_START → STRATEGY_START → SCAN → EXECUTE → RISK_CHECK →
 *   ORDER_PLACE → RETRY_QUEUE → LEDGER → RECONCILE → ALLOCATION →
 *   STRATEGY_END → AGENT_STOP
 */

import { randomUUID } from 'crypto';
import type { SupabaseClient } from '@supabase/supabase-js';
import { isRecord, sanitizeForLogging } from './sanitize';

// ──────────────────────────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogStage =
    | 'AGENT_START'
    | 'AGENT_STOP'
    | 'STRATEGY_START'
    | 'STRATEGY_END'
    | 'SCAN'
    | 'EXECUTE'
    | 'RISK_CHECK'
    | 'ORDER_PLACE'
    | 'RETRY_QUEUE'
    | 'LEDGER'
    | 'RECONCILE'
    | 'MONITOR'
    | 'ALLOCATION'
    | 'SIGNAL_FEED'
    | 'CONFIG'
    | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
};

const LEVEL_ICON: Record<LogLevel, string> = {
    trace: '🔍',
    debug: '🐛',
    info: 'ℹ️ ',
    warn: '⚠️ ',
    error: '❌',
};

interface LogContext {
    trace_id: string;
    run_id: string;
    strategy?: string;
    ticker?: string;
    trace_start_ms: number;
}

export interface BotLoggerOptions {
    minLevel?: LogLevel;
    supabase?: SupabaseClient | null;
    table?: string;
}

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_RANK;
}

// ──────────────────────────────────────────────────────────────────────
// Logger Class
// ──────────────────────────────────────────────────────────────────────

export class BotLogger {
    private ctx: LogContext;
    private readonly minLevel: LogLevel;
    private readonly supabase: SupabaseClient | null;
    private readonly table: string;

    constructor(runId: string, options: BotLoggerOptions = {}) {
        this.ctx = {
            trace_id: randomUUID(),
            run_id: runId,
            trace_start_ms: Date.now(),
        };
        this.minLevel = options.minLevel ?? 'info';
        this.supabase = options.supabase ?? null;
        this.table = options.table ?? 'agent_logs';
    }

    /** Child logger for one strategy: same run, new trace. */
    forStrategy(strategy: string): BotLogger {
        return this.child({ strategy, trace_id: randomUUID(), trace_start_ms: Date.now() });
    }

    /** Child logger with the same trace and an added ticker. */
    withTicker(ticker: string): BotLogger {
        return this.child({ ticker });
    }

    get traceId(): string {
        return this.ctx.trace_id;
    }

    get runId(): string {
        return this.ctx.run_id;
    }

    private child(overrides: Partial<LogContext>): BotLogger {
        const child = new BotLogger(this.ctx.run_id, {
            minLevel: this.minLevel,
            supabase: this.supabase,
            table: this.table,
        });
        child.ctx = { ...this.ctx, ...overrides };
        return child;
    }

    // ── Core log method ──

    log(level: LogLevel, stage: LogStage, message: string, extra?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;

        const elapsed_ms = Date.now() - this.ctx.trace_start_ms;
        const payload = extra ? sanitizeForLogging(extra) : null;
        const safeExtra = isRecord(payload) ? payload : null;

        const scope = [this.ctx.strategy, this.ctx.ticker].filter(Boolean).join(' ');
        const prefix = `${LEVEL_ICON[level]} [${this.ctx.trace_id.slice(0, 8)}] [+${elapsed_ms}ms] [${stage}]${scope ? ` [${scope}]` : ''}`;
        const line = `${prefix} ${message}${safeExtra ? ` ${JSON.stringify(safeExtra)}` : ''}`;
        if (level === 'error') {
            console.error(line);
        } else if (level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }

        if (this.supabase) {
            this.persist(this.supabase, level, stage, message, elapsed_ms, safeExtra).catch((err: unknown) => {
                console.error('[BotLogger] persist failed:', err);
            });
        }
    }

    private async persist(
        supabase: SupabaseClient,
        level: LogLevel,
        stage: LogStage,
        message: string,
        elapsed_ms: number,
        extra: Record<string, unknown> | null,
    ): Promise<void> {
        const { error } = await supabase.from(this.table).insert({
            level,
            stage,
            message,
            trace_id: this.ctx.trace_id,
            run_id: this.ctx.run_id,
            strategy: this.ctx.strategy ?? null,
            ticker: this.ctx.ticker ?? null,
            elapsed_ms,
            extra,
        });
        if (error) throw new Error(error.message);
    }

    // ── Convenience methods ──

    trace(stage: LogStage, message: string, extra?: Record<string, unknown>): void {
        this.log('trace', stage, message, extra);
    }

    debug(stage: LogStage, message: string, extra?: Record<string, unknown>): void {
        this.log('debug', stage, message, extra);
    }

    info(stage: LogStage, message: string, extra?: Record<string, unknown>): void {
        this.log('info', stage, message, extra);
    }

    warn(stage: LogStage, message: string, extra?: Record<string, unknown>): void {
        this.log('warn', stage, message, extra);
    }

    error(stage: LogStage, message: string, extra?: Record<string, unknown>): void {
        this.log('error', stage, message, extra);
    }
}

// ──────────────────────────────────────────────────────────────────────
// Factory
// ──────────────────────────────────────────────────────────────────────

/** Create the root logger for one agent run. */
export function createBotLogger(options: BotLoggerOptions = {}): BotLogger {
    return new BotLogger(randomUUID(), options);
}
