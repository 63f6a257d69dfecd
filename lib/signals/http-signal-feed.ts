/**
 * Polls a JSON endpoint for trade signals.
 *
 * Accepts `{ signals: [...] }` or a bare array. Rows missing an id, ticker,
 * side or a 1-99 price are skipped. Ids already returned are not returned
 * again; the memory of seen ids is bounded.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { readArray, readNumber, readRecord, readString } from '@/lib/exchange/parse';
import type { BotLogger } from '@/lib/logging/bot-logger';
import type { SignalSource, TradeSignal } from './types';

export interface HttpSignalFeedOptions {
    url: string;
    source?: string;
    apiKey?: string;
    timeoutMs?: number;
    maxRemembered?: number;
    logger?: BotLogger;
    adapter?: AxiosAdapter;
}

export class HttpSignalFeed implements SignalSource {
    private readonly http: AxiosInstance;
    private readonly url: string;
    private readonly source: string;
    private readonly maxRemembered: number;
    private readonly logger?: BotLogger;
    private readonly seen = new Set<string>();

    constructor(options: HttpSignalFeedOptions) {
        this.url = options.url;
        this.source = options.source ?? 'signal-feed';
        this.maxRemembered = options.maxRemembered ?? 10_000;
        this.logger = options.logger;
        this.http = axios.create({
            timeout: options.timeoutMs ?? 15_000,
            headers: options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {},
            adapter: options.adapter,
        });
    }

    async fetchSignals(): Promise<TradeSignal[]> {
        const res = await this.http.get<unknown>(this.url);
        const rows = readArray(Array.isArray(res.data) ? res.data : readRecord(res.data).signals);

        const fresh: TradeSignal[] = [];
        let skipped = 0;
        for (const raw of rows) {
            const signal = this.parse(raw);
            if (!signal) {
                skipped++;
                continue;
            }
            if (this.seen.has(signal.id)) continue;
            this.remember(signal.id);
            fresh.push(signal);
        }

        if (skipped > 0) {
            this.logger?.warn('SIGNAL_FEED', `Skipped ${skipped} malformed signal(s)`);
        }
        if (fresh.length > 0) {
            this.logger?.debug('SIGNAL_FEED', `${fresh.length} new signal(s)`);
        }
        return fresh;
    }

    private parse(raw: unknown): TradeSignal | null {
        const row = readRecord(raw);
        const id = readString(row.id) ?? (typeof row.id === 'number' ? String(row.id) : undefined);
        const ticker = readString(row.ticker);
        const sideText = readString(row.side)?.toUpperCase();
        const side = sideText === 'YES' || sideText === 'NO' ? sideText : undefined;
        const price = readNumber(row.price_cents ?? row.price);
        if (!id || !ticker || !side || price === undefined) return null;
        if (!Number.isInteger(price) || price < 1 || price > 99) return null;

        const signal: TradeSignal = {
            id,
            source: readString(row.source) ?? this.source,
            ticker,
            side,
            price_cents: price,
        };
        const selector = readString(row.selector) ?? readString(row.series_ticker);
        if (selector) signal.selector = selector;
        const probability = readNumber(row.win_probability);
        if (probability !== undefined && probability > 0 && probability < 1) signal.win_probability = probability;
        const title = readString(row.market_title) ?? readString(row.title);
        if (title) signal.market_title = title;
        const observedAt = readString(row.observed_at);
        if (observedAt) signal.observed_at = observedAt;
        return signal;
    }

    private remember(id: string): void {
        this.seen.add(id);
        if (this.seen.size > this.maxRemembered) {
            const oldest = this.seen.values().next();
            if (!oldest.done) this.seen.delete(oldest.value);
        }
    }
}
