/**
 * Trading Agent Worker
 *
 * Runs every registered strategy on its own loop, plus a housekeeping loop
 * that reconciles positions against the exchange and rebalances strategy
 * allocations. DRY_RUN=true (the default) trades the simulated universe only.
 *
 * Run: npm start
 * Run one cycle of each strategy and exit: npm start -- --once
 */

import { loadConfig, loadEnvFiles } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { createTradingAgent } from './agent';

loadEnvFiles();

async function main(): Promise<void> {
    const config = loadConfig();
    const agent = createTradingAgent(config);
    const { logger, scheduler } = agent;

    logger.info('AGENT_START', `Trading agent starting (${agent.universe} universe)`, {
        data_dir: config.dataDir,
        scan_interval_seconds: config.scanIntervalSeconds,
    });

    if (process.argv.includes('--once')) {
        const results = await scheduler.runAllOnce();
        await scheduler.housekeep();
        console.log(JSON.stringify({ results, ...scheduler.exportResults() }, null, 2));
        agent.dispose();
        return;
    }

    const shutdown = (signalName: string) => {
        logger.info('AGENT_STOP', `${signalName} received, stopping`);
        scheduler.stop();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    try {
        await scheduler.run();
    } finally {
        agent.dispose();
        logger.info('AGENT_STOP', 'Trading agent stopped', { best_strategy: scheduler.getBestStrategy() });
    }
}

main().catch((error: unknown) => {
    console.error('[trading-agent] Fatal:', errorMessage(error));
    process.exitCode = 1;
});
