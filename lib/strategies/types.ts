// Strategy capability as the scheduler consumes it.

import type { PositionSide } from '@/lib/ledger/types';

export type StrategyMode = 'cyclic' | 'continuous';

/** A candidate trade found by `scan()`. */
export interface Opportunity {
    ticker: string;
    side: PositionSide;
    price_cents: number;
    win_probability?: number;
    edge?: number;
    market_title?: string;
    source?: string;
    /** Re-resolved by the retry queue if the market rolls over. */
    selector?: string;
    expected_settlement?: string;
}

export interface StrategyPerformance {
    total_pnl: number;
    win_rate: number;
    trades: number;
}

export interface Strategy {
    readonly name: string;
    readonly dryRun: boolean;
    readonly mode: StrategyMode;
    readonly intervalSeconds?: number;

    scan(): Promise<Opportunity[]>;
    /** Returns the number of trades placed. */
    execute(opportunities: Opportunity[]): Promise<number>;
    getPerformance(): StrategyPerformance;
    /** Continuous mode only. Must return once `signal` aborts. */
    continuousTradeLoop?(signal: AbortSignal): Promise<void>;
}

export interface StrategyResult {
    name: string;
    opportunities_found: number;
    trades_executed: number;
    profit_loss: number;
    win_rate: number;
    runtime_seconds: number;
    errors: string[];
    timestamp: string;
}
