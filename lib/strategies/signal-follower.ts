/**
 * Signal Follower: trades what an upstream signal source reports.
 *
 * Each cycle (or each batch in continuous mode):
 *   1. drain the retry queue before looking at anything new
 *   2. pull fresh signals, skip tickers already held
 *   3. circuit breakers → EV filter → rank by EV → size → exposure gate
 *   4. hand each sized trade to the executor
 *
 * Continuous mode polls the source into a SignalChannel and executes
 * whatever has arrived each time the channel wakes.
 */

import { sanitizeError } from '@/lib/errors';
import type { PositionLedger } from '@/lib/ledger/position-ledger';
import type { Universe } from '@/lib/ledger/types';
import type { BotLogger } from '@/lib/logging/bot-logger';
import type { ExposureTracker } from '@/lib/orders/exposure-tracker';
import type { RetryQueue } from '@/lib/orders/retry-queue';
import type { TradeExecutor } from '@/lib/orders/trade-executor';
import type { RiskSizer } from '@/lib/risk/risk-sizer';
import { SignalChannel } from '@/lib/signals/signal-channel';
import type { SignalSource, TradeSignal } from '@/lib/signals/types';
import { sleep } from '@/lib/utils/sleep';
import type { Opportunity, Strategy, StrategyMode, StrategyPerformance } from './types';

/** Current bankroll in dollars. */
export type BankrollFn = () => Promise<number>;

export interface SignalFollowerOptions {
    name?: string;
    mode?: StrategyMode;
    intervalSeconds?: number;
    pollIntervalSeconds?: number;
    /** Edge over the signal's price assumed when it carries no probability. */
    assumedEdge?: number;
    maxTradesPerCycle?: number;
    source: SignalSource;
    executor: TradeExecutor;
    sizer: RiskSizer;
    exposure: ExposureTracker;
    ledger: PositionLedger;
    bankroll: BankrollFn;
    retryQueue?: RetryQueue;
    logger: BotLogger;
}

interface RankedOpportunity {
    opportunity: Opportunity;
    probability: number;
    odds: number;
    ev: number;
}

export class SignalFollowerStrategy implements Strategy {
    readonly name: string;
    readonly mode: StrategyMode;
    readonly intervalSeconds?: number;

    private readonly pollIntervalMs: number;
    private readonly assumedEdge: number;
    private readonly maxTradesPerCycle: number;
    private readonly source: SignalSource;
    private readonly executor: TradeExecutor;
    private readonly sizer: RiskSizer;
    private readonly exposure: ExposureTracker;
    private readonly ledger: PositionLedger;
    private readonly bankroll: BankrollFn;
    private readonly retryQueue?: RetryQueue;
    private readonly logger: BotLogger;

    constructor(options: SignalFollowerOptions) {
        this.name = options.name ?? 'signal-follower';
        this.mode = options.mode ?? 'cyclic';
        this.intervalSeconds = options.intervalSeconds;
        this.pollIntervalMs = (options.pollIntervalSeconds ?? 10) * 1000;
        this.assumedEdge = options.assumedEdge ?? 0.05;
        this.maxTradesPerCycle = options.maxTradesPerCycle ?? 3;
        this.source = options.source;
        this.executor = options.executor;
        this.sizer = options.sizer;
        this.exposure = options.exposure;
        this.ledger = options.ledger;
        this.bankroll = options.bankroll;
        this.retryQueue = options.retryQueue;
        this.logger = options.logger.forStrategy(this.name);
    }

    get dryRun(): boolean {
        return this.executor.dryRun;
    }

    private get universe(): Universe {
        return this.executor.universe;
    }

    async scan(): Promise<Opportunity[]> {
        await this.drainRetryQueue();
        const signals = await this.source.fetchSignals();
        return this.toOpportunities(signals);
    }

    async execute(opportunities: Opportunity[]): Promise<number> {
        if (opportunities.length === 0) return 0;

        let bankroll = await this.bankroll();
        if (!this.sizer.canTrade(bankroll)) {
            this.logger.warn('RISK_CHECK', `Risk limits hit at bankroll $${bankroll.toFixed(2)}; skipping trades`);
            return 0;
        }

        const winRate = this.ledger.getPerformance(this.name, this.universe).win_rate;
        const ranked = opportunities
            .map((opportunity) => this.rank(opportunity))
            .filter((r) => this.sizer.meetsEvThreshold(r.ev, bankroll, winRate))
            .sort((a, b) => b.ev - a.ev)
            .slice(0, this.maxTradesPerCycle);

        let executed = 0;
        for (const { opportunity, odds, ev } of ranked) {
            const sizeUsd = this.sizer.calculatePositionSize(bankroll, winRate, ev, odds);
            if (sizeUsd <= 0) continue;
            if (await this.place(opportunity, bankroll, sizeUsd)) {
                executed++;
                bankroll = await this.bankroll();
            }
        }
        return executed;
    }

    getPerformance(): StrategyPerformance {
        const perf = this.ledger.getPerformance(this.name, this.universe);
        return { total_pnl: perf.total_pnl, win_rate: perf.win_rate, trades: perf.trades };
    }

    async continuousTradeLoop(signal: AbortSignal): Promise<void> {
        const channel = new SignalChannel<TradeSignal>();
        const pump = new AbortController();
        const stopPump = () => pump.abort();
        signal.addEventListener('abort', stopPump, { once: true });
        const producer = this.pollInto(channel, pump.signal);

        try {
            for (;;) {
                const first = await channel.next(signal);
                if (first === null) break;
                await this.drainRetryQueue();
                const opportunities = this.toOpportunities([first, ...channel.drain()]);
                const executed = await this.execute(opportunities);
                if (executed > 0) {
                    this.logger.info('EXECUTE', `Executed ${executed} of ${opportunities.length} signal(s)`);
                }
            }
        } finally {
            signal.removeEventListener('abort', stopPump);
            pump.abort();
            channel.close();
            await producer;
        }
    }

    // ── Internals ──

    private async pollInto(channel: SignalChannel<TradeSignal>, signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            try {
                for (const item of await this.source.fetchSignals()) {
                    channel.push(item);
                }
            } catch (err) {
                this.logger.error('SIGNAL_FEED', 'Signal poll failed', { error: sanitizeError(err) });
            }
            await sleep(this.pollIntervalMs, signal);
        }
        channel.close();
    }

    private async drainRetryQueue(): Promise<void> {
        if (!this.retryQueue || this.retryQueue.size === 0) return;
        const placed = await this.retryQueue.processQueue();
        if (placed > 0) {
            this.logger.info('RETRY_QUEUE', `Placed ${placed} queued order(s) before new signals`);
        }
    }

    private toOpportunities(signals: readonly TradeSignal[]): Opportunity[] {
        return signals
            .filter((s) => !this.ledger.hasOpenPosition(s.ticker, this.universe))
            .map((s) => ({
                ticker: s.ticker,
                side: s.side,
                price_cents: s.price_cents,
                win_probability: s.win_probability,
                market_title: s.market_title,
                source: s.source,
                selector: s.selector,
            }));
    }

    private rank(opportunity: Opportunity): RankedOpportunity {
        const price = opportunity.price_cents / 100;
        const odds = 1 / price;
        const probability = opportunity.win_probability ?? Math.min(0.99, price + this.assumedEdge);
        return { opportunity, probability, odds, ev: this.sizer.calculateEv(probability, odds) };
    }

    /** Gate by exposure, convert dollars to contracts, execute. True when a position opened. */
    private async place(opportunity: Opportunity, bankroll: number, sizeUsd: number): Promise<boolean> {
        const log = this.logger.withTicker(opportunity.ticker);
        const admitted = this.exposure.reserve(bankroll, sizeUsd, opportunity.ticker);
        const contracts = Math.floor((admitted * 100) / opportunity.price_cents + 1e-9);
        if (contracts < 1) {
            this.exposure.release(opportunity.ticker);
            log.debug('RISK_CHECK', `Admitted $${admitted.toFixed(2)} buys no contracts at ${opportunity.price_cents}c`);
            return false;
        }
        const notional = (contracts * opportunity.price_cents) / 100;
        this.exposure.trim(opportunity.ticker, notional);

        const outcome = await this.executor.execute({
            ticker: opportunity.ticker,
            side: opportunity.side,
            priceCents: opportunity.price_cents,
            contracts,
            strategy: this.name,
            source: opportunity.source ?? this.name,
            selector: opportunity.selector,
            marketTitle: opportunity.market_title,
            expectedSettlement: opportunity.expected_settlement,
        });

        if (outcome.status === 'opened') {
            this.exposure.commit(opportunity.ticker);
            log.info('EXECUTE', `Opened ${opportunity.side} x${contracts} @ ${opportunity.price_cents}c ($${notional.toFixed(2)})`);
            return true;
        }
        this.exposure.release(opportunity.ticker);
        if (outcome.status === 'queued') {
            log.info('EXECUTE', 'Market unavailable; order queued for retry');
        }
        return false;
    }
}
