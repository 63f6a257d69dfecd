// In-process exchange for tests.

import { settlementFromMarket } from '@/lib/exchange/settlement';
import type {
    Balance,
    ExchangeClient,
    ExchangePosition,
    Market,
    MarketFilter,
    Orderbook,
    OrderRequest,
    PlaceOrderResult,
    SettlementStatus,
} from '@/lib/exchange/types';

export type OrderHandler = (order: OrderRequest) => PlaceOrderResult | Promise<PlaceOrderResult>;

export class FakeExchange implements ExchangeClient {
    readonly markets = new Map<string, Market>();
    readonly orderbooks = new Map<string, Orderbook>();
    readonly settlements = new Map<string, SettlementStatus>();
    readonly brokenLookups = new Set<string>();
    readonly orders: OrderRequest[] = [];
    positions: ExchangePosition[] = [];
    balanceCents = 10_000;
    onOrder: OrderHandler = () => ({ success: true, orderId: `ord-${this.orders.length}` });

    addMarket(market: Partial<Market> & { ticker: string }): void {
        this.markets.set(market.ticker, { title: market.ticker, status: 'active', ...market });
    }

    async getMarkets(filter: MarketFilter = {}): Promise<Market[]> {
        return [...this.markets.values()].filter(
            (m) =>
                (!filter.seriesTicker || m.series_ticker === filter.seriesTicker) &&
                (!filter.eventTicker || m.event_ticker === filter.eventTicker),
        );
    }

    async getMarket(ticker: string): Promise<Market | null> {
        return this.markets.get(ticker) ?? null;
    }

    async getOrderbook(ticker: string): Promise<Orderbook> {
        return this.orderbooks.get(ticker) ?? { yes: [], no: [] };
    }

    async placeOrder(order: OrderRequest): Promise<PlaceOrderResult> {
        this.orders.push(order);
        return this.onOrder(order);
    }

    async getPositions(): Promise<ExchangePosition[]> {
        return this.positions;
    }

    async getBalance(): Promise<Balance> {
        return { balance_cents: this.balanceCents };
    }

    async getSettlementStatus(ticker: string): Promise<SettlementStatus> {
        if (this.brokenLookups.has(ticker)) {
            throw new Error(`lookup failed for ${ticker}`);
        }
        return this.settlements.get(ticker) ?? settlementFromMarket(this.markets.get(ticker) ?? null);
    }
}
