import type { ExchangeClient, Market } from '@/lib/exchange/types';
import type { TickerResolver } from './retry-queue';

const TRADABLE = new Set(['open', 'active']);

/**
 * Resolve a selector against the exchange: a ticker whose market is still
 * tradable resolves to itself; anything else is treated as a series and
 * resolves to its tradable market closing soonest.
 */
export function createTickerResolver(exchange: ExchangeClient): TickerResolver {
    return async (selector) => {
        const market = await exchange.getMarket(selector);
        if (market) {
            return TRADABLE.has(market.status) ? market.ticker : null;
        }

        const markets = await exchange.getMarkets({ seriesTicker: selector, status: 'open' });
        const next = markets
            .filter((m) => TRADABLE.has(m.status))
            .sort((a, b) => closeTimeMs(a) - closeTimeMs(b))[0];
        return next?.ticker ?? null;
    };
}

function closeTimeMs(market: Market): number {
    const ms = market.close_time ? Date.parse(market.close_time) : NaN;
    return Number.isNaN(ms) ? Number.POSITIVE_INFINITY : ms;
}
