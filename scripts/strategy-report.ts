#!/usr/bin/env npx tsx
/**
 * Daily and all-time strategy performance from the position ledger.
 * Run: npx tsx scripts/strategy-report.ts [YYYY-MM-DD] [strategy]
 */
import { loadConfig, loadEnvFiles } from '@/lib/config';
import { buildPerformanceReport } from '@/lib/ledger/performance-report';
import { PositionLedger } from '@/lib/ledger/position-ledger';
import { createBotLogger } from '@/lib/logging/bot-logger';

loadEnvFiles();

async function main() {
    const [dateArg, strategy] = process.argv.slice(2);
    const date = dateArg ? new Date(`${dateArg}T00:00:00Z`) : undefined;
    if (date && Number.isNaN(date.getTime())) {
        throw new Error(`Invalid date "${dateArg}", expected YYYY-MM-DD`);
    }

    const config = loadConfig();
    const ledger = new PositionLedger({ dataDir: config.dataDir, logger: createBotLogger({ minLevel: 'warn' }) });

    console.log(`Ledger: ${config.dataDir}\n`);
    for (const line of buildPerformanceReport(ledger, { date, strategy })) {
        console.log(line);
    }
}

main().catch((e) => { console.error(e); process.exit(1); });
