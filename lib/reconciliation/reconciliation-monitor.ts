/**
 * Reconciliation Monitor: local ledger vs. exchange truth.
 *
 * Per open position:
 *   OPEN ──► OPEN       still held on the exchange, or market active
 *        ──► FINALIZED  event closed, result not yet published (re-checked next pass)
 *        ──► SETTLED    explicit settlement price → ledger closed with P&L
 *        ──► UNKNOWN    gone with no determinable status → flagged, never closed
 *
 * Only an explicit settlement price closes a position.
 */

import { ReconciliationAmbiguity, errorMessage, sanitizeError } from '@/lib/errors';
import type { TradingEventBus } from '@/lib/events/event-bus';
import type { ExchangeClient, SettlementStatus } from '@/lib/exchange/types';
import type { PositionLedger } from '@/lib/ledger/position-ledger';
import type { Position, Universe } from '@/lib/ledger/types';
import type { BotLogger } from '@/lib/logging/bot-logger';
import {
    DEFAULT_THRESHOLDS,
    buildPositionState,
    formatPct,
    hedgeRecommendations,
    type HedgeRecommendation,
    type MarketDataFn,
    type MonitorThresholds,
    type PositionState,
} from './position-analysis';

// ──────────────────────────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────────────────────────

export interface ReconciliationSummary {
    checked: number;
    settled: number;
    finalized: number;
    unknown: number;
    still_open: number;
    ambiguities: ReconciliationAmbiguity[];
}

export interface PositionSummary {
    count: number;
    total_pnl: number;
    avg_entry_price: number;
    positions: string[];
}

/** The parts of a strategy the monitor needs. */
export interface MonitoredStrategy {
    name: string;
    dryRun: boolean;
}

export interface ReconciliationMonitorOptions {
    ledger: PositionLedger;
    exchange: ExchangeClient;
    logger: BotLogger;
    events?: TradingEventBus;
    thresholds?: Partial<MonitorThresholds>;
}

/**
 * Settlement value of the side held, and P&L in dollars.
 * `settlementPrice` is the YES payout in cents; a NO position is worth the rest.
 */
export function settlementPnl(position: Pick<Position, 'side' | 'entry_price' | 'contracts'>, settlementPrice: number) {
    const value = position.side === 'YES' ? settlementPrice : 100 - settlementPrice;
    return {
        exit_price: value,
        pnl: ((value - position.entry_price) * position.contracts) / 100,
    };
}

// ──────────────────────────────────────────────────────────────────────
// Monitor
// ──────────────────────────────────────────────────────────────────────

export class ReconciliationMonitor {
    private readonly ledger: PositionLedger;
    private readonly exchange: ExchangeClient;
    private readonly logger: BotLogger;
    private readonly events?: TradingEventBus;
    private readonly thresholds: MonitorThresholds;

    constructor(options: ReconciliationMonitorOptions) {
        this.ledger = options.ledger;
        this.exchange = options.exchange;
        this.logger = options.logger;
        this.events = options.events;
        this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    }

    /**
     * Check every open position of a strategy that the exchange no longer
     * reports. In the simulated universe nothing is on the exchange, so every
     * open position is checked against its market's settlement.
     */
    async syncWithExchange(strategy: string, universe: Universe): Promise<ReconciliationSummary> {
        const open = this.ledger.getOpenPositions(strategy, universe);
        const summary: ReconciliationSummary = {
            checked: 0,
            settled: 0,
            finalized: 0,
            unknown: 0,
            still_open: open.length,
            ambiguities: [],
        };
        if (open.length === 0) return summary;

        let candidates = open;
        if (universe === 'real') {
            let held: Set<string>;
            try {
                const positions = await this.exchange.getPositions();
                held = new Set(positions.filter((p) => p.position !== 0).map((p) => p.ticker));
            } catch (err) {
                this.logger.error('RECONCILE', 'Could not fetch exchange positions; skipping pass', {
                    strategy,
                    error: sanitizeError(err),
                });
                return summary;
            }
            candidates = open.filter((p) => !held.has(p.ticker));
        }

        for (const position of candidates) {
            summary.checked++;
            const log = this.logger.withTicker(position.ticker);
            const status = await this.settlementOf(position.ticker);

            switch (status.state) {
                case 'settled': {
                    const { exit_price, pnl } = settlementPnl(position, status.settlement_price);
                    const closed = this.ledger.closePosition(position.ticker, exit_price, pnl, universe);
                    if (closed) {
                        summary.settled++;
                        summary.still_open--;
                        log.info('RECONCILE', `Settled at ${status.settlement_price}c (P&L $${pnl.toFixed(2)})`, { strategy });
                    }
                    break;
                }
                case 'finalized':
                    summary.finalized++;
                    log.info('RECONCILE', 'Event closed; settlement not yet published', { strategy });
                    break;
                case 'active':
                    if (universe === 'real') {
                        this.flag(summary, position, 'market still active but position missing from exchange', strategy);
                    }
                    break;
                case 'unknown':
                    this.flag(summary, position, status.reason, strategy);
                    break;
            }
        }

        this.logger.info('RECONCILE', `Reconciled ${strategy} [${universe}]`, {
            checked: summary.checked,
            settled: summary.settled,
            finalized: summary.finalized,
            unknown: summary.unknown,
            still_open: summary.still_open,
        });
        return summary;
    }

    async analyzePosition(position: Position, marketDataFn: MarketDataFn): Promise<PositionState | null> {
        try {
            const snapshot = await marketDataFn(position.ticker);
            if (!snapshot) return null;
            return buildPositionState(position, snapshot, this.thresholds);
        } catch (err) {
            this.logger.error('MONITOR', `Error analyzing ${position.ticker}`, { error: sanitizeError(err) });
            return null;
        }
    }

    async checkAllPositions(strategy: MonitoredStrategy, marketDataFn: MarketDataFn): Promise<PositionState[]> {
        const open = this.ledger.getOpenPositions(strategy.name, strategy.dryRun ? 'simulated' : 'real');
        if (open.length === 0) return [];

        this.logger.info('MONITOR', `Checking ${open.length} open positions for ${strategy.name}`);
        const states: PositionState[] = [];
        for (const position of open) {
            const state = await this.analyzePosition(position, marketDataFn);
            if (state) {
                states.push(state);
                this.logRecommendation(state);
            }
        }
        return states;
    }

    generateHedgeRecommendations(states: readonly PositionState[]): HedgeRecommendation[] {
        return hedgeRecommendations(states);
    }

    getPositionSummary(strategy: string, universe: Universe): PositionSummary {
        const open = this.ledger.getOpenPositions(strategy, universe);
        if (open.length === 0) {
            return { count: 0, total_pnl: 0, avg_entry_price: 0, positions: [] };
        }
        return {
            count: open.length,
            total_pnl: open.reduce((sum, p) => sum + (p.pnl ?? 0), 0),
            avg_entry_price: open.reduce((sum, p) => sum + p.entry_price, 0) / open.length,
            positions: open.map((p) => p.ticker),
        };
    }

    // ── Internals ──

    private async settlementOf(ticker: string): Promise<SettlementStatus> {
        try {
            return await this.exchange.getSettlementStatus(ticker);
        } catch (err) {
            return { state: 'unknown', reason: `settlement lookup failed: ${errorMessage(err)}` };
        }
    }

    private flag(summary: ReconciliationSummary, position: Position, reason: string, strategy: string): void {
        const ambiguity = new ReconciliationAmbiguity(`${position.ticker}: ${reason}`, position.ticker);
        summary.unknown++;
        summary.ambiguities.push(ambiguity);
        this.logger.withTicker(position.ticker).warn('RECONCILE', `Needs manual review: ${reason}`, { strategy });
        this.events?.emit('ReconciliationUnknown', {
            strategy,
            ticker: position.ticker,
            universe: position.simulated ? 'simulated' : 'real',
            reason,
        });
    }

    private logRecommendation(state: PositionState): void {
        const msg = `${state.ticker}: ${state.side} | P&L: ${formatPct(state.pnl_pct, true)} | Edge: ${formatPct(state.current_edge)} | ${state.recommendation}`;
        if (state.recommendation === 'HEDGE') {
            this.logger.warn('MONITOR', `Hedge opportunity: ${msg}`);
        } else if (state.recommendation === 'EXIT') {
            this.logger.error('MONITOR', `Exit signal: ${msg}`);
        } else {
            this.logger.info('MONITOR', msg);
        }
    }
}
