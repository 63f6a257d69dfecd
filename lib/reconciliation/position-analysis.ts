// Exit and hedge recommendations for open positions.
// Pure functions; the monitor supplies market data and logging.

import type { Position, PositionSide } from '@/lib/ledger/types';

export type Recommendation = 'HOLD' | 'WATCH' | 'HEDGE' | 'EXIT' | 'SETTLED';

/** Current view of one market as a strategy sees it. */
export interface MarketSnapshot {
    price: number;              // cents, for the side held
    edge: number;               // model edge, fraction
    settled?: boolean;
}

export type MarketDataFn = (ticker: string) => Promise<MarketSnapshot | null>;

export interface PositionState {
    ticker: string;
    side: PositionSide;
    entry_price: number;
    current_price: number;
    current_edge: number;
    pnl_pct: number;
    recommendation: Recommendation;
}

export interface HedgeRecommendation {
    ticker: string;
    original_side: PositionSide;
    hedge_side: PositionSide;
    hedge_size: number;
    reason: string;
}

export interface MonitorThresholds {
    edgeThreshold: number;
    takeProfitPct: number;
    stopLossPct: number;
    strongEdge: number;
    hedgeMovePct: number;
}

export const DEFAULT_THRESHOLDS: MonitorThresholds = {
    edgeThreshold: 0.05,
    takeProfitPct: 0.5,
    stopLossPct: -0.3,
    strongEdge: 0.15,
    hedgeMovePct: 0.1,
};

const HEDGE_BASE_SIZE = 5;

export function pnlPct(side: PositionSide, entryPrice: number, currentPrice: number): number {
    return side === 'YES'
        ? (currentPrice - entryPrice) / entryPrice
        : (entryPrice - currentPrice) / entryPrice;
}

export function recommend(edge: number, pnl: number, thresholds: MonitorThresholds = DEFAULT_THRESHOLDS): Recommendation {
    if (pnl < thresholds.stopLossPct) return 'EXIT';
    if (pnl > thresholds.takeProfitPct) return 'EXIT';

    if (edge < thresholds.edgeThreshold) {
        return Math.abs(pnl) > thresholds.hedgeMovePct ? 'HEDGE' : 'HOLD';
    }
    if (edge > thresholds.strongEdge) return 'HOLD';
    return 'WATCH';
}

export function buildPositionState(
    position: Position,
    snapshot: MarketSnapshot,
    thresholds: MonitorThresholds = DEFAULT_THRESHOLDS,
): PositionState {
    const pnl = pnlPct(position.side, position.entry_price, snapshot.price);
    return {
        ticker: position.ticker,
        side: position.side,
        entry_price: position.entry_price,
        current_price: snapshot.price,
        current_edge: snapshot.edge,
        pnl_pct: pnl,
        recommendation: snapshot.settled ? 'SETTLED' : recommend(snapshot.edge, pnl, thresholds),
    };
}

/** Full size above +30%, half between +10% and +30%, one contract otherwise. */
export function hedgeSize(pnl: number): number {
    if (pnl > 0.3) return HEDGE_BASE_SIZE;
    if (pnl > 0.1) return Math.max(1, Math.floor(HEDGE_BASE_SIZE / 2));
    return 1;
}

export function hedgeRecommendations(states: readonly PositionState[]): HedgeRecommendation[] {
    return states
        .filter((s) => s.recommendation === 'HEDGE')
        .map((s): HedgeRecommendation => ({
            ticker: s.ticker,
            original_side: s.side,
            hedge_side: s.side === 'YES' ? 'NO' : 'YES',
            hedge_size: hedgeSize(s.pnl_pct),
            reason: `Edge dropped to ${formatPct(s.current_edge)}, P&L at ${formatPct(s.pnl_pct, true)}`,
        }));
}

export function formatPct(value: number, signed = false): string {
    const text = `${(value * 100).toFixed(1)}%`;
    return signed && value >= 0 ? `+${text}` : text;
}
