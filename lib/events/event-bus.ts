/**
 * Event bus for position and order lifecycle.
 *
 * One bus per agent, passed through the trading context.
 * Consumers: alerting, dashboards, tests.
 */

import { EventEmitter } from 'events';
import type { Universe } from '@/lib/ledger/types';

export type TradingEventType =
    | 'PositionOpened'
    | 'PositionClosed'
    | 'PositionCancelled'
    | 'TradeQueued'
    | 'TradeRetried'
    | 'TradeDropped'
    | 'ReconciliationUnknown'
    | 'AllocationsUpdated';

export interface TradingEventPayload {
    timestamp: string;
    strategy?: string;
    ticker?: string;
    universe?: Universe;
    reason?: string;
    [key: string]: unknown;
}

export type TradingEventHandler = (payload: TradingEventPayload & { type: TradingEventType }) => void;

export class TradingEventBus {
    private readonly emitter = new EventEmitter();

    constructor(maxListeners = 20) {
        this.emitter.setMaxListeners(maxListeners);
    }

    emit(type: TradingEventType, payload: Omit<TradingEventPayload, 'timestamp'>): void {
        const event = { ...payload, type, timestamp: new Date().toISOString() };
        this.emitter.emit(type, event);
        this.emitter.emit('*', event);
    }

    /** Subscribe; returns the unsubscribe function. */
    on(type: TradingEventType | '*', handler: TradingEventHandler): () => void {
        this.emitter.on(type, handler);
        return () => {
            this.emitter.off(type, handler);
        };
    }
}
