/**
 * Wires one trading agent from its config: ledger, exchange, risk, order
 * handling, reconciliation and the scheduler with its strategies.
 *
 * The exchange and signal source can be passed in; otherwise the HTTP
 * clients are built from config.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AgentConfig } from '@/lib/config';
import { ConfigError } from '@/lib/errors';
import { TradingEventBus } from '@/lib/events/event-bus';
import { HttpExchangeClient } from '@/lib/exchange/http-exchange-client';
import type { ExchangeClient } from '@/lib/exchange/types';
import { PositionLedger } from '@/lib/ledger/position-ledger';
import type { Universe } from '@/lib/ledger/types';
import { createBotLogger, type BotLogger } from '@/lib/logging/bot-logger';
import { ExposureTracker } from '@/lib/orders/exposure-tracker';
import { RetryQueue } from '@/lib/orders/retry-queue';
import { createTickerResolver } from '@/lib/orders/ticker-resolver';
import { TradeExecutor } from '@/lib/orders/trade-executor';
import { ReconciliationMonitor } from '@/lib/reconciliation/reconciliation-monitor';
import { RiskSizer } from '@/lib/risk/risk-sizer';
import { HttpSignalFeed } from '@/lib/signals/http-signal-feed';
import type { SignalSource } from '@/lib/signals/types';
import { StrategyScheduler } from '@/lib/strategies/scheduler';
import { SignalFollowerStrategy } from '@/lib/strategies/signal-follower';

export interface TradingAgent {
    config: AgentConfig;
    logger: BotLogger;
    events: TradingEventBus;
    ledger: PositionLedger;
    exchange: ExchangeClient;
    sizer: RiskSizer;
    exposure: ExposureTracker;
    retryQueue: RetryQueue;
    monitor: ReconciliationMonitor;
    scheduler: StrategyScheduler;
    universe: Universe;
    bankroll(): Promise<number>;
    /** Detach event subscriptions. */
    dispose(): void;
}

export interface TradingAgentOverrides {
    exchange?: ExchangeClient;
    signalSource?: SignalSource;
    logger?: BotLogger;
}

export function createTradingAgent(config: AgentConfig, overrides: TradingAgentOverrides = {}): TradingAgent {
    const logger = overrides.logger ?? createBotLogger({
        minLevel: config.logLevel,
        supabase: createLogSink(config),
    });
    const events = new TradingEventBus();
    const universe: Universe = config.dryRun ? 'simulated' : 'real';

    const ledger = new PositionLedger({ dataDir: config.dataDir, logger, events });
    const exchange = overrides.exchange ?? new HttpExchangeClient({
        baseUrl: config.exchangeApiBaseUrl,
        apiKey: config.exchangeApiKey,
        logger,
    });

    const sizer = new RiskSizer(
        { initialBankroll: config.initialBankroll, dailyLossLimit: config.dailyLossLimit, minTradeUsd: config.minTradeUsd },
        { logger },
    );
    const exposure = new ExposureTracker({ maxExposurePct: config.maxExposurePct, logger });
    exposure.syncFromLedger(ledger.getOpenPositions(undefined, universe));

    const retryQueue = new RetryQueue({
        exchange,
        ledger,
        logger,
        exposure,
        events,
        resolveTicker: createTickerResolver(exchange),
        maxRetries: config.retryMaxAttempts,
        maxQueueAgeSeconds: config.retryMaxAgeSeconds,
    });
    const executor = new TradeExecutor({ ledger, exchange, retryQueue, logger, dryRun: config.dryRun });
    const monitor = new ReconciliationMonitor({ ledger, exchange, logger, events });
    const scheduler = new StrategyScheduler({
        logger,
        monitor,
        events,
        defaultIntervalSeconds: config.scanIntervalSeconds,
        reconcileIntervalSeconds: config.reconcileIntervalSeconds,
        optimizeEveryCycles: config.optimizeEveryCycles,
    });

    const bankroll = async (): Promise<number> => {
        if (config.dryRun) {
            return config.initialBankroll + ledger.getPerformance(undefined, 'simulated').total_pnl;
        }
        const balance = await exchange.getBalance();
        return balance.balance_cents / 100;
    };

    const source = overrides.signalSource ?? createSignalFeed(config, logger);
    scheduler.register(new SignalFollowerStrategy({
        intervalSeconds: config.scanIntervalSeconds,
        source,
        executor,
        sizer,
        exposure,
        ledger,
        bankroll,
        retryQueue,
        logger: logger.forStrategy('signal-follower'),
    }), 1);

    // Opens from any path count toward exposure; settled positions feed the streak/loss counters and free it.
    const unsubscribers = [
        events.on('PositionOpened', (event) => {
            if (event.universe !== universe) return;
            exposure.syncFromLedger(ledger.getOpenPositions(undefined, universe));
        }),
        events.on('PositionClosed', (event) => {
            if (event.universe !== universe) return;
            if (typeof event.pnl === 'number') sizer.recordResult(event.pnl);
            exposure.syncFromLedger(ledger.getOpenPositions(undefined, universe));
        }),
        events.on('PositionCancelled', (event) => {
            if (event.universe !== universe) return;
            exposure.syncFromLedger(ledger.getOpenPositions(undefined, universe));
        }),
    ];

    return {
        config,
        logger,
        events,
        ledger,
        exchange,
        sizer,
        exposure,
        retryQueue,
        monitor,
        scheduler,
        universe,
        bankroll,
        dispose: () => {
            for (const unsubscribe of unsubscribers) unsubscribe();
        },
    };
}

function createLogSink(config: AgentConfig): SupabaseClient | null {
    if (!config.supabaseUrl || !config.supabaseServiceRoleKey) return null;
    return createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
        auth: { autoRefreshToken: false, persistSession: false },
    });
}

function createSignalFeed(config: AgentConfig, logger: BotLogger): SignalSource {
    if (!config.signalFeedUrl) {
        throw new ConfigError('SIGNAL_FEED_URL is required to run the signal follower');
    }
    return new HttpSignalFeed({ url: config.signalFeedUrl, logger });
}
