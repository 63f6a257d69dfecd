/**
 * Retry Queue: order requests that failed transiently.
 *
 * A request fails transiently when its market closed or rolled over between
 * the signal and the order. The queue keeps the request's selector rather
 * than its ticker, so each attempt resolves to whatever market is current.
 *
 * Per pass, for every entry queued before the pass began:
 *   1. drop without attempting when older than the TTL or out of attempts
 *   2. otherwise bump retry_count, resolve the selector, place once
 *   3. success → remove, record in the real ledger, resync exposure
 *      transient → keep
 *      permanent → drop
 *
 * Only one pass runs at a time; a concurrent call returns 0.
 */

import { randomUUID } from 'crypto';
import { errorMessage, sanitizeError } from '@/lib/errors';
import type { TradingEventBus } from '@/lib/events/event-bus';
import type { ExchangeClient, PlaceOrderResult } from '@/lib/exchange/types';
import type { PositionLedger } from '@/lib/ledger/position-ledger';
import type { PositionSide } from '@/lib/ledger/types';
import type { BotLogger } from '@/lib/logging/bot-logger';
import type { ExposureTracker } from './exposure-tracker';

// ──────────────────────────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────────────────────────

export interface TradeRequest {
    source: string;
    /** Ticker or series selector; resolved to a ticker at attempt time. */
    selector: string;
    side: PositionSide;
    price: number;              // cents
    size: number;               // contracts
    strategy: string;
    marketTitle?: string;
}

export interface QueuedTrade {
    id: string;
    source: string;
    selector: string;
    ticker?: string;            // last resolved
    side: PositionSide;
    price: number;
    size: number;
    strategy: string;
    market_title: string;
    queued_at: number;          // epoch ms
    retry_count: number;
    last_error?: string;
}

/** Map a selector to the market that is current now; null when none is. */
export type TickerResolver = (selector: string) => Promise<string | null>;

export type DropReason = 'expired' | 'exhausted' | 'permanent' | 'duplicate';

export interface RetryQueueOptions {
    exchange: ExchangeClient;
    ledger: PositionLedger;
    logger: BotLogger;
    exposure?: ExposureTracker;
    events?: TradingEventBus;
    resolveTicker?: TickerResolver;
    maxRetries?: number;
    maxQueueAgeSeconds?: number;
    now?: () => Date;
}

const identityResolver: TickerResolver = async (selector) => selector;

// ──────────────────────────────────────────────────────────────────────
// Queue
// ──────────────────────────────────────────────────────────────────────

export class RetryQueue {
    private readonly exchange: ExchangeClient;
    private readonly ledger: PositionLedger;
    private readonly logger: BotLogger;
    private readonly exposure?: ExposureTracker;
    private readonly events?: TradingEventBus;
    private readonly resolveTicker: TickerResolver;
    private readonly maxRetries: number;
    private readonly maxQueueAgeMs: number;
    private readonly now: () => Date;
    private readonly entries = new Map<string, QueuedTrade>();
    private processing = false;

    constructor(options: RetryQueueOptions) {
        this.exchange = options.exchange;
        this.ledger = options.ledger;
        this.logger = options.logger;
        this.exposure = options.exposure;
        this.events = options.events;
        this.resolveTicker = options.resolveTicker ?? identityResolver;
        this.maxRetries = options.maxRetries ?? 10;
        this.maxQueueAgeMs = (options.maxQueueAgeSeconds ?? 600) * 1000;
        this.now = options.now ?? (() => new Date());
    }

    get size(): number {
        return this.entries.size;
    }

    list(): QueuedTrade[] {
        return [...this.entries.values()].map((entry) => ({ ...entry }));
    }

    enqueue(request: TradeRequest, error?: string): QueuedTrade {
        const entry: QueuedTrade = {
            id: randomUUID(),
            source: request.source,
            selector: request.selector,
            side: request.side,
            price: request.price,
            size: request.size,
            strategy: request.strategy,
            market_title: request.marketTitle ?? '',
            queued_at: this.now().getTime(),
            retry_count: 0,
        };
        if (error) entry.last_error = error;

        this.entries.set(entry.id, entry);
        this.logger.info('RETRY_QUEUE', `Queued ${request.selector} for retry (${this.entries.size} pending)`, {
            source: request.source,
            error,
        });
        this.events?.emit('TradeQueued', { strategy: request.strategy, ticker: request.selector, reason: error });
        return { ...entry };
    }

    /** Run one pass; returns the number of orders placed. */
    async processQueue(): Promise<number> {
        if (this.processing) {
            this.logger.debug('RETRY_QUEUE', 'Pass already running; skipping');
            return 0;
        }
        this.processing = true;
        try {
            let successes = 0;
            for (const entry of [...this.entries.values()]) {
                if (await this.attempt(entry)) successes++;
            }
            this.dropExpired();
            if (successes > 0) {
                this.logger.info('RETRY_QUEUE', `Retried ${successes} order(s); ${this.entries.size} still pending`);
            }
            return successes;
        } finally {
            this.processing = false;
        }
    }

    private async attempt(entry: QueuedTrade): Promise<boolean> {
        const age = this.now().getTime() - entry.queued_at;
        if (age > this.maxQueueAgeMs) {
            this.drop(entry, 'expired', `queued ${Math.round(age / 1000)}s ago`);
            return false;
        }
        if (entry.retry_count >= this.maxRetries) {
            this.drop(entry, 'exhausted', `${entry.retry_count} attempts`);
            return false;
        }

        entry.retry_count++;
        const log = this.logger.withTicker(entry.selector);

        let ticker: string | null;
        try {
            ticker = await this.resolveTicker(entry.selector);
        } catch (err) {
            entry.last_error = errorMessage(err);
            log.warn('RETRY_QUEUE', `Selector lookup failed (attempt ${entry.retry_count})`, { error: sanitizeError(err) });
            return false;
        }
        if (!ticker) {
            entry.last_error = 'no current market for selector';
            log.debug('RETRY_QUEUE', `No current market (attempt ${entry.retry_count})`);
            return false;
        }
        entry.ticker = ticker;

        // A live execute may be placing the same ticker right now.
        if (!this.ledger.claimTicker(ticker, 'real')) {
            this.drop(entry, 'duplicate', `already holding or placing ${ticker}`);
            return false;
        }
        try {
            return await this.place(entry, ticker, log);
        } finally {
            this.ledger.releaseTicker(ticker, 'real');
        }
    }

    private async place(entry: QueuedTrade, ticker: string, log: BotLogger): Promise<boolean> {
        let result: PlaceOrderResult;
        try {
            result = await this.exchange.placeOrder({
                ticker,
                side: entry.side,
                priceCents: entry.price,
                count: entry.size,
            });
        } catch (err) {
            this.drop(entry, 'permanent', errorMessage(err));
            return false;
        }

        if (!result.success) {
            entry.last_error = result.error;
            if (result.failure === 'transient') {
                log.info('RETRY_QUEUE', `Still unavailable (attempt ${entry.retry_count}/${this.maxRetries}): ${result.error}`);
                return false;
            }
            this.drop(entry, 'permanent', result.error);
            return false;
        }

        this.entries.delete(entry.id);
        log.info('RETRY_QUEUE', `Retry succeeded on attempt ${entry.retry_count}: order ${result.orderId}`);
        this.events?.emit('TradeRetried', {
            strategy: entry.strategy,
            ticker,
            attempts: entry.retry_count,
            order_id: result.orderId,
        });

        try {
            this.ledger.openPosition({
                ticker,
                side: entry.side,
                contracts: entry.size,
                entryPrice: entry.price,
                strategy: entry.strategy,
                universe: 'real',
                marketTitle: entry.market_title,
            });
        } catch (err) {
            log.error('LEDGER', `Order ${result.orderId} placed but not recorded`, { error: sanitizeError(err) });
        }
        this.exposure?.syncFromLedger(this.ledger.getOpenPositions(undefined, 'real'));
        return true;
    }

    /** Entries that aged out while the pass awaited later ones. */
    private dropExpired(): void {
        const now = this.now().getTime();
        for (const entry of [...this.entries.values()]) {
            const age = now - entry.queued_at;
            if (age > this.maxQueueAgeMs) this.drop(entry, 'expired', `queued ${Math.round(age / 1000)}s ago`);
        }
    }

    private drop(entry: QueuedTrade, reason: DropReason, detail: string): void {
        this.entries.delete(entry.id);
        this.logger.warn('RETRY_QUEUE', `Dropped ${entry.ticker ?? entry.selector} (${reason}): ${detail}`, {
            source: entry.source,
            retry_count: entry.retry_count,
            last_error: entry.last_error,
        });
        this.events?.emit('TradeDropped', {
            strategy: entry.strategy,
            ticker: entry.ticker ?? entry.selector,
            reason,
        });
    }
}
