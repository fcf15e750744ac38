#!/usr/bin/env tsx
/**
 * Ledger Engine CLI
 *
 * - CLI handles all file I/O (uses node:fs)
 * - Core receives file text, returns parsed rows and the final ledger
 * - Core has no file system access, no console.* calls
 */

import { parseArgs } from './args.js';
import { processFile } from './commands/process.js';

async function main() {
    const command = parseArgs(process.argv.slice(2));

    if (command.kind === 'help') {
        console.log('Ledger Engine CLI v1.0.0');
        console.log('');
        console.log('Usage: ledger <transactions.csv> [--out-dir <dir>] [--config <file>] [--dry-run]');
        console.log('');
        console.log('Writes accounts.csv and failed.csv next to the input file unless');
        console.log('--out-dir or output_dir in ledger.config.yaml says otherwise.');
        console.log('');
        console.log('Example:');
        console.log('  ledger csvFiles/transactions.csv');
        process.exit(0);
    }

    if (command.kind === 'invalid') {
        console.error(`✖ Error: ${command.message}`);
        console.error('Run "ledger --help" for usage.');
        process.exit(1);
    }

    await processFile(command.inputPath, command.options);
}

main().catch((err) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
