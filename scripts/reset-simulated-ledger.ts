#!/usr/bin/env npx tsx
/**
 * Weekly reset of the simulated universe. The current book is backed up
 * beside the ledger unless --no-backup is passed. Real positions are untouched.
 * Run: npx tsx scripts/reset-simulated-ledger.ts [--no-backup]
 */
import { loadConfig, loadEnvFiles } from '@/lib/config';
import { PositionLedger } from '@/lib/ledger/position-ledger';
import { createBotLogger } from '@/lib/logging/bot-logger';

loadEnvFiles();

async function main() {
    const config = loadConfig();
    const ledger = new PositionLedger({ dataDir: config.dataDir, logger: createBotLogger({ minLevel: config.logLevel }) });

    const open = ledger.getOpenPositions(undefined, 'simulated').length;
    const cleared = ledger.clearSimulated({ backup: !process.argv.includes('--no-backup') });
    console.log(`Cleared ${cleared} simulated positions (${open} were open).`);
}

main().catch((e) => { console.error(e); process.exit(1); });
