/**
 * REST exchange client.
 *
 * Endpoints (relative to the configured base URL):
 *   GET  /markets                      list markets
 *   GET  /markets/:ticker              one market (404 → null)
 *   GET  /markets/:ticker/orderbook    resting bids per side
 *   POST /portfolio/orders             limit buy
 *   GET  /portfolio/positions          open positions
 *   GET  /portfolio/balance            cash balance in cents
 *
 * Order failures are classified here, once: a missing or closed market is
 * transient (the window rolled over), everything else is permanent.
 * Authenticates with a bearer API key; request signing is not done here.
 */

import { randomUUID } from 'crypto';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { OrderFailureKind } from '@/lib/errors';
import { errorMessage } from '@/lib/errors';
import type { BotLogger } from '@/lib/logging/bot-logger';
import { readArray, readNumber, readRecord, readString } from './parse';
import { settlementFromMarket } from './settlement';
import type {
    Balance,
    ExchangeClient,
    ExchangePosition,
    Market,
    MarketFilter,
    MarketStatus,
    Orderbook,
    OrderbookLevel,
    OrderRequest,
    PlaceOrderResult,
    SettlementStatus,
} from './types';

const TRANSIENT_ERROR_CODES = new Set(['market_not_found', 'market_closed', 'market_not_open']);

const MARKET_STATUSES: readonly MarketStatus[] = [
    'initialized',
    'open',
    'active',
    'closed',
    'determined',
    'finalized',
    'settled',
];

export interface HttpExchangeClientOptions {
    baseUrl: string;
    apiKey: string;
    timeoutMs?: number;
    logger?: BotLogger;
    /** Replaces the network transport; used by tests. */
    adapter?: AxiosAdapter;
}

export class ExchangeHttpError extends Error {
    constructor(
        message: string,
        readonly status: number,
        readonly code?: string,
    ) {
        super(message);
        this.name = 'ExchangeHttpError';
    }
}

export class HttpExchangeClient implements ExchangeClient {
    private readonly http: AxiosInstance;
    private readonly logger?: BotLogger;

    constructor(options: HttpExchangeClientOptions) {
        this.logger = options.logger;
        this.http = axios.create({
            baseURL: options.baseUrl.replace(/\/+$/, ''),
            timeout: options.timeoutMs ?? 30_000,
            headers: {
                'Authorization': `Bearer ${options.apiKey}`,
                'Content-Type': 'application/json',
            },
            // Status codes are inspected per call.
            validateStatus: () => true,
            adapter: options.adapter,
        });
    }

    async getMarkets(filter: MarketFilter = {}): Promise<Market[]> {
        const params: Record<string, string | number> = {
            status: filter.status ?? 'open',
            limit: filter.limit ?? 100,
        };
        if (filter.seriesTicker) params.series_ticker = filter.seriesTicker;
        if (filter.eventTicker) params.event_ticker = filter.eventTicker;

        const body = await this.get('/markets', params);
        return readArray(body.markets).flatMap((raw) => {
            const market = parseMarket(raw);
            return market ? [market] : [];
        });
    }

    async getMarket(ticker: string): Promise<Market | null> {
        const res = await this.http.get<unknown>(`/markets/${encodeURIComponent(ticker)}`);
        if (res.status === 404) return null;
        const body = this.checked(res.status, res.data, `GET /markets/${ticker}`);
        return parseMarket(body.market);
    }

    async getOrderbook(ticker: string): Promise<Orderbook> {
        const body = await this.get(`/markets/${encodeURIComponent(ticker)}/orderbook`);
        const book = readRecord(body.orderbook);
        return { yes: parseLevels(book.yes), no: parseLevels(book.no) };
    }

    async placeOrder(order: OrderRequest): Promise<PlaceOrderResult> {
        const side = order.side === 'YES' ? 'yes' : 'no';
        const payload: Record<string, unknown> = {
            ticker: order.ticker,
            action: 'buy',
            side,
            count: Math.trunc(order.count),
            type: 'limit',
            client_order_id: randomUUID(),
            [side === 'yes' ? 'yes_price' : 'no_price']: Math.trunc(order.priceCents),
        };

        try {
            const res = await this.http.post<unknown>('/portfolio/orders', payload);
            if (res.status === 200 || res.status === 201) {
                const orderId = readString(readRecord(readRecord(res.data).order).order_id);
                if (orderId) return { success: true, orderId };
                return { success: false, error: 'Order accepted without an order id', failure: 'permanent', statusCode: res.status };
            }

            const { code, message } = parseErrorBody(res.data);
            const failure: OrderFailureKind =
                res.status === 404 || (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) ? 'transient' : 'permanent';
            return {
                success: false,
                error: message ?? code ?? `HTTP ${res.status}`,
                failure,
                statusCode: res.status,
            };
        } catch (err) {
            this.logger?.error('ORDER_PLACE', `Order request failed for ${order.ticker}`, { error: errorMessage(err) });
            return { success: false, error: errorMessage(err), failure: 'permanent' };
        }
    }

    async getPositions(): Promise<ExchangePosition[]> {
        const body = await this.get('/portfolio/positions');
        const rows = readArray(body.market_positions ?? body.positions);
        return rows.flatMap((raw) => {
            const row = readRecord(raw);
            const ticker = readString(row.ticker);
            const position = readNumber(row.position);
            if (!ticker || position === undefined) return [];
            const exposure = readNumber(row.market_exposure);
            return [exposure === undefined ? { ticker, position } : { ticker, position, market_exposure: exposure }];
        });
    }

    async getBalance(): Promise<Balance> {
        const body = await this.get('/portfolio/balance');
        const balance = readNumber(body.balance);
        if (balance === undefined) throw new ExchangeHttpError('GET /portfolio/balance returned no balance', 200);
        return { balance_cents: balance };
    }

    async getSettlementStatus(ticker: string): Promise<SettlementStatus> {
        return settlementFromMarket(await this.getMarket(ticker));
    }

    // ── Transport ──

    private async get(path: string, params?: Record<string, string | number>): Promise<Record<string, unknown>> {
        const res = await this.http.get<unknown>(path, { params });
        return this.checked(res.status, res.data, `GET ${path}`);
    }

    private checked(status: number, data: unknown, label: string): Record<string, unknown> {
        if (status >= 200 && status < 300) return readRecord(data);
        const { code, message } = parseErrorBody(data);
        throw new ExchangeHttpError(`${label} failed (${status}): ${message ?? code ?? 'no details'}`, status, code);
    }
}

// ──────────────────────────────────────────────────────────────────────
// Response parsing
// ──────────────────────────────────────────────────────────────────────

function parseMarket(raw: unknown): Market | null {
    const row = readRecord(raw);
    const ticker = readString(row.ticker);
    if (!ticker) return null;

    const status = MARKET_STATUSES.find((s) => s === row.status) ?? 'unknown';
    const market: Market = {
        ticker,
        title: readString(row.title) ?? '',
        status,
    };

    const eventTicker = readString(row.event_ticker);
    if (eventTicker) market.event_ticker = eventTicker;
    const seriesTicker = readString(row.series_ticker);
    if (seriesTicker) market.series_ticker = seriesTicker;
    const closeTime = readString(row.close_time);
    if (closeTime) market.close_time = closeTime;

    const yesBid = readNumber(row.yes_bid);
    if (yesBid !== undefined) market.yes_bid = yesBid;
    const yesAsk = readNumber(row.yes_ask);
    if (yesAsk !== undefined) market.yes_ask = yesAsk;
    const noBid = readNumber(row.no_bid);
    if (noBid !== undefined) market.no_bid = noBid;
    const noAsk = readNumber(row.no_ask);
    if (noAsk !== undefined) market.no_ask = noAsk;

    if (row.result === 'yes' || row.result === 'no') market.result = row.result;
    const settlementValue = readNumber(row.settlement_value);
    if (settlementValue !== undefined) market.settlement_value = settlementValue;

    return market;
}

function parseLevels(raw: unknown): OrderbookLevel[] {
    return readArray(raw).flatMap((level) => {
        const pair = readArray(level);
        const price = readNumber(pair[0]);
        const size = readNumber(pair[1]);
        return price === undefined || size === undefined ? [] : [[price, size]];
    });
}

function parseErrorBody(data: unknown): { code?: string; message?: string } {
    const body = readRecord(data);
    const error = readRecord(body.error);
    return {
        code: readString(error.code) ?? readString(body.code),
        message: readString(error.message) ?? readString(body.message) ?? readString(body.error),
    };
}
