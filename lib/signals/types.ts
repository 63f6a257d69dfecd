import type { PositionSide } from '@/lib/ledger/types';

/** A trade observed upstream (a followed trader, a model, an alert). */
export interface TradeSignal {
    id: string;
    source: string;
    ticker: string;
    /** Series or event the ticker belongs to; used to find the next market on rollover. */
    selector?: string;
    side: PositionSide;
    price_cents: number;
    win_probability?: number;
    market_title?: string;
    observed_at?: string;
}

export interface SignalSource {
    /** Signals not returned by an earlier call. */
    fetchSignals(): Promise<TradeSignal[]>;
}
