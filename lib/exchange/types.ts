// Exchange collaborator types
// Prices are integer cents (1-99) for binary YES/NO contracts.

import type { OrderFailureKind } from '@/lib/errors';
import type { PositionSide } from '@/lib/ledger/types';

export type MarketStatus =
    | 'initialized'
    | 'open'
    | 'active'
    | 'closed'
    | 'determined'
    | 'finalized'
    | 'settled'
    | 'unknown';

export interface Market {
    ticker: string;
    title: string;
    status: MarketStatus;
    event_ticker?: string;
    series_ticker?: string;
    close_time?: string;
    yes_bid?: number;
    yes_ask?: number;
    no_bid?: number;
    no_ask?: number;
    result?: 'yes' | 'no';
    settlement_value?: number;  // YES payout in cents, when published
}

export interface MarketFilter {
    seriesTicker?: string;
    eventTicker?: string;
    status?: 'open' | 'closed' | 'settled';
    limit?: number;
}

export type OrderbookLevel = [priceCents: number, size: number];

export interface Orderbook {
    yes: OrderbookLevel[];
    no: OrderbookLevel[];
}

export interface OrderRequest {
    ticker: string;
    side: PositionSide;
    priceCents: number;
    count: number;
}

export type PlaceOrderResult =
    | { success: true; orderId: string }
    | { success: false; error: string; failure: OrderFailureKind; statusCode?: number };

export interface ExchangePosition {
    ticker: string;
    position: number;           // signed contracts: > 0 YES, < 0 NO
    market_exposure?: number;   // cents
}

export interface Balance {
    balance_cents: number;
}

/**
 * What the exchange says about a market's outcome.
 * `settled` always carries the authoritative YES payout.
 */
export type SettlementStatus =
    | { state: 'settled'; settlement_price: number }
    | { state: 'finalized' }
    | { state: 'active' }
    | { state: 'unknown'; reason: string };

/**
 * The exchange as the core consumes it. Implementations rate-limit and
 * authenticate on their own.
 */
export interface ExchangeClient {
    getMarkets(filter?: MarketFilter): Promise<Market[]>;
    getMarket(ticker: string): Promise<Market | null>;
    getOrderbook(ticker: string): Promise<Orderbook>;
    placeOrder(order: OrderRequest): Promise<PlaceOrderResult>;
    getPositions(): Promise<ExchangePosition[]>;
    getBalance(): Promise<Balance>;
    getSettlementStatus(ticker: string): Promise<SettlementStatus>;
}
