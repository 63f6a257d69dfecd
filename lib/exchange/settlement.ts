import type { Market, SettlementStatus } from './types';

/**
 * Derive settlement from a market snapshot.
 *
 * Only an explicit result or settlement value counts as settled; a market
 * marked settled without one is reported as unknown.
 */
export function settlementFromMarket(market: Market | null): SettlementStatus {
    if (!market) {
        return { state: 'unknown', reason: 'market not found' };
    }

    switch (market.status) {
        case 'settled':
        case 'determined': {
            const price = settlementPrice(market);
            return price === null
                ? { state: 'unknown', reason: `market ${market.status} without a published result` }
                : { state: 'settled', settlement_price: price };
        }
        case 'closed':
        case 'finalized':
            return { state: 'finalized' };
        case 'initialized':
        case 'open':
        case 'active':
            return { state: 'active' };
        default:
            return { state: 'unknown', reason: `unrecognised market status ${market.status}` };
    }
}

function settlementPrice(market: Market): number | null {
    if (typeof market.settlement_value === 'number' && market.settlement_value >= 0 && market.settlement_value <= 100) {
        return market.settlement_value;
    }
    if (market.result === 'yes') return 100;
    if (market.result === 'no') return 0;
    return null;
}
