/**
 * Exposure Tracker: gates new trades by open notional.
 *
 *   open_exposure + in_flight ≤ max_exposure_pct × bankroll
 *
 * Open exposure mirrors the ledger. In-flight reservations are keyed by
 * ticker and live apart from it, so a ledger sync never erases a
 * reservation whose order is still being placed. A reservation leaves the
 * in-flight book on commit, on release, or when a sync finds its ticker open.
 *
 * All dollar amounts are in USD. Every method is synchronous.
 */

import type { BotLogger } from '@/lib/logging/bot-logger';
import { positionNotional, type Position } from '@/lib/ledger/types';

// ──────────────────────────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────────────────────────

export interface ExposureTrackerOptions {
    maxExposurePct: number;
    logger?: BotLogger;
}

const EPSILON = 1e-9;

// ──────────────────────────────────────────────────────────────────────
// Tracker
// ──────────────────────────────────────────────────────────────────────

export class ExposureTracker {
    private readonly maxExposurePct: number;
    private readonly logger?: BotLogger;
    private openExposure = 0;
    private readonly inFlight = new Map<string, number>();

    constructor(options: ExposureTrackerOptions) {
        if (!(options.maxExposurePct > 0 && options.maxExposurePct <= 1)) {
            throw new RangeError(`maxExposurePct must be in (0, 1], got ${options.maxExposurePct}`);
        }
        this.maxExposurePct = options.maxExposurePct;
        this.logger = options.logger;
    }

    /** Open plus in-flight notional. */
    get current(): number {
        return this.openExposure + this.pending;
    }

    get pending(): number {
        let total = 0;
        for (const notional of this.inFlight.values()) total += notional;
        return total;
    }

    /** Dollars that can still be committed at this bankroll. */
    headroom(bankroll: number): number {
        return Math.max(0, this.maxExposurePct * bankroll - this.current);
    }

    /**
     * Admit as much of the candidate as fits: the full amount, the remaining
     * headroom when smaller, or 0. The admitted amount is held in flight
     * under `ticker` until commit or release. A ticker already in flight
     * admits nothing.
     */
    reserve(bankroll: number, notional: number, ticker: string): number {
        if (notional <= 0) return 0;
        if (this.inFlight.has(ticker)) {
            this.logger?.debug('RISK_CHECK', `${ticker} already has a reservation in flight`);
            return 0;
        }

        const headroom = this.headroom(bankroll);
        const admitted = notional <= headroom + EPSILON ? notional : headroom;
        if (admitted <= EPSILON) {
            this.logger?.info('RISK_CHECK', `Exposure limit reached: $${this.current.toFixed(2)} committed`, {
                bankroll,
                requested: notional,
            });
            return 0;
        }
        if (admitted < notional) {
            this.logger?.info('RISK_CHECK', `Trimmed $${notional.toFixed(2)} to $${admitted.toFixed(2)} of remaining headroom`);
        }

        this.inFlight.set(ticker, admitted);
        return admitted;
    }

    /** Shrink a reservation to what the order actually uses. */
    trim(ticker: string, notional: number): void {
        const reserved = this.inFlight.get(ticker);
        if (reserved === undefined) return;
        this.inFlight.set(ticker, Math.max(0, Math.min(reserved, notional)));
    }

    /** The position opened: move its reservation into open exposure. No-op once a sync has counted it. */
    commit(ticker: string): void {
        const reserved = this.inFlight.get(ticker);
        if (reserved === undefined) return;
        this.inFlight.delete(ticker);
        this.openExposure += reserved;
    }

    /** The order was abandoned: drop its reservation. */
    release(ticker: string): void {
        this.inFlight.delete(ticker);
    }

    /** Recompute open exposure from ledger rows; reservations for tickers now open are settled. */
    syncFromLedger(positions: readonly Position[]): void {
        let open = 0;
        for (const p of positions) {
            if (p.status !== 'open') continue;
            open += positionNotional(p);
            this.inFlight.delete(p.ticker);
        }
        this.openExposure = open;
        this.logger?.debug('RISK_CHECK', `Exposure synced: $${open.toFixed(2)} open, $${this.pending.toFixed(2)} in flight`);
    }
}
