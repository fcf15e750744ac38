import type { LedgerConfig } from '@ledger-engine/shared';
import { loadConfig } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import type { ProcessOptions } from '../types.js';

export async function processFile(inputPath: string, options: ProcessOptions): Promise<void> {
    log(`\nLedger Engine - Processing ${inputPath}`);

    // 1. Load configuration
    let config: LedgerConfig;
    try {
        config = loadConfig(options.config);
    } catch (err) {
        error(`Error: Failed to load config. ${(err as Error).message}`);
        process.exit(1);
    }

    // 2. Run Pipeline
    const state = await runPipeline(inputPath, config, options);

    // 3. Report Final Status
    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Processing failed with fatal errors.');
            process.exit(1);
        }
    }

    const accounts = state.runResult?.accounts.length ?? 0;
    const failed = state.runResult?.failed.length ?? 0;

    arrow(`A total of ${accounts} accounts were found!`);
    arrow(`A total of ${failed} transactions have failed!`);

    if (!state.options.dryRun) {
        arrow(`Accounts written to: ${state.outputs.accountsPath}`);
        arrow(`Failed transactions written to: ${state.outputs.failedPath}`);
    } else {
        log('\n[DRY RUN] No files were written.');
    }

    success('transactions processing complete!');
}
