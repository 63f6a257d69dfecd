// Position ledger types
// Field names match the persisted JSON documents.

export type Universe = 'real' | 'simulated';

export type PositionSide = 'YES' | 'NO';

export type PositionStatus = 'open' | 'closed' | 'cancelled';

export interface Position {
    ticker: string;
    side: PositionSide;
    contracts: number;          // > 0
    entry_price: number;        // cents, 1-99
    entry_time: string;         // ISO
    strategy: string;
    simulated: boolean;
    market_title: string;
    status: PositionStatus;
    expected_settlement?: string;

    // Set exactly once, on close
    exit_price?: number;        // cents
    exit_time?: string;
    pnl?: number;               // dollars
}

export interface OpenPositionInput {
    ticker: string;
    side: PositionSide;
    contracts: number;
    entryPrice: number;
    strategy: string;
    universe: Universe;
    marketTitle?: string;
    expectedSettlement?: string;
    /** Skip (return null) when an open position already exists for the ticker. */
    dedupe?: boolean;
}

export interface LedgerPerformance {
    trades: number;
    winning_trades: number;
    win_rate: number;
    total_pnl: number;
    open_count: number;
    avg_pnl_per_trade: number;
}

export interface DailyPerformance {
    date: string;               // YYYY-MM-DD (UTC)
    strategy: string;
    total_trades: number;
    unique_markets: number;
    closed_trades: number;
    total_pnl: number;
    tickers: string[];
}

export interface StrategyLedgerPerformance {
    real: LedgerPerformance;
    simulated: LedgerPerformance;
    combined_trades: number;
    combined_pnl: number;
}

/** Notional in dollars tied up in a position at entry. */
export function positionNotional(position: Pick<Position, 'contracts' | 'entry_price'>): number {
    return (position.contracts * position.entry_price) / 100;
}
