/**
 * Trade Executor: turns a sized trade into a ledger row.
 *
 *   dry run → simulated ledger, no exchange call
 *   live    → place order; success → real ledger
 *                          transient failure → retry queue
 *                          permanent failure → rejected
 */

import { errorMessage, sanitizeError } from '@/lib/errors';
import type { ExchangeClient, PlaceOrderResult } from '@/lib/exchange/types';
import type { PositionLedger } from '@/lib/ledger/position-ledger';
import type { Position, PositionSide, Universe } from '@/lib/ledger/types';
import type { BotLogger } from '@/lib/logging/bot-logger';
import type { QueuedTrade, RetryQueue } from './retry-queue';

export interface TradeIntent {
    ticker: string;
    side: PositionSide;
    priceCents: number;
    contracts: number;
    strategy: string;
    source: string;
    /** What the retry queue re-resolves if the market rolls over; defaults to the ticker. */
    selector?: string;
    marketTitle?: string;
    expectedSettlement?: string;
}

export type ExecutionOutcome =
    | { status: 'opened'; position: Position; orderId?: string }
    | { status: 'duplicate' }
    | { status: 'queued'; queued: QueuedTrade }
    | { status: 'rejected'; error: string };

export interface TradeExecutorOptions {
    ledger: PositionLedger;
    exchange: ExchangeClient;
    retryQueue?: RetryQueue;
    logger: BotLogger;
    dryRun: boolean;
}

export class TradeExecutor {
    private readonly ledger: PositionLedger;
    private readonly exchange: ExchangeClient;
    private readonly retryQueue?: RetryQueue;
    private readonly logger: BotLogger;
    readonly dryRun: boolean;

    constructor(options: TradeExecutorOptions) {
        this.ledger = options.ledger;
        this.exchange = options.exchange;
        this.retryQueue = options.retryQueue;
        this.logger = options.logger;
        this.dryRun = options.dryRun;
    }

    get universe(): Universe {
        return this.dryRun ? 'simulated' : 'real';
    }

    async execute(intent: TradeIntent): Promise<ExecutionOutcome> {
        const log = this.logger.withTicker(intent.ticker);

        // Claimed before the first await so a concurrent execute on the same ticker sees it.
        if (!this.ledger.claimTicker(intent.ticker, this.universe)) {
            log.debug('EXECUTE', 'Already holding or placing this ticker; skipping');
            return { status: 'duplicate' };
        }

        try {
            if (this.dryRun) {
                const position = this.record(intent);
                return position ? { status: 'opened', position } : { status: 'duplicate' };
            }
            return await this.placeLive(intent, log);
        } finally {
            this.ledger.releaseTicker(intent.ticker, this.universe);
        }
    }

    private async placeLive(intent: TradeIntent, log: BotLogger): Promise<ExecutionOutcome> {
        let result: PlaceOrderResult;
        try {
            result = await this.exchange.placeOrder({
                ticker: intent.ticker,
                side: intent.side,
                priceCents: intent.priceCents,
                count: intent.contracts,
            });
        } catch (err) {
            log.error('ORDER_PLACE', 'Order request threw', { error: sanitizeError(err) });
            return { status: 'rejected', error: errorMessage(err) };
        }

        if (result.success) {
            log.info('ORDER_PLACE', `Placed ${intent.side} x${intent.contracts} @ ${intent.priceCents}c: ${result.orderId}`);
            const position = this.record(intent);
            if (!position) {
                log.warn('LEDGER', `Order ${result.orderId} filled a ticker another strategy already holds`);
                return { status: 'duplicate' };
            }
            return { status: 'opened', position, orderId: result.orderId };
        }

        if (result.failure === 'transient' && this.retryQueue) {
            const queued = this.retryQueue.enqueue(
                {
                    source: intent.source,
                    selector: intent.selector ?? intent.ticker,
                    side: intent.side,
                    price: intent.priceCents,
                    size: intent.contracts,
                    strategy: intent.strategy,
                    marketTitle: intent.marketTitle,
                },
                result.error,
            );
            return { status: 'queued', queued };
        }

        log.warn('ORDER_PLACE', `Order rejected (${result.failure}): ${result.error}`, { status_code: result.statusCode });
        return { status: 'rejected', error: result.error };
    }

    private record(intent: TradeIntent): Position | null {
        return this.ledger.openPosition({
            ticker: intent.ticker,
            side: intent.side,
            contracts: intent.contracts,
            entryPrice: intent.priceCents,
            strategy: intent.strategy,
            universe: this.universe,
            marketTitle: intent.marketTitle,
            expectedSettlement: intent.expectedSettlement,
        });
    }
}
