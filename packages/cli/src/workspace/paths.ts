import { dirname, join, resolve } from 'node:path';
import type { LedgerConfig } from '@ledger-engine/shared';
import type { OutputPaths } from '../types.js';

/**
 * Resolves where the accounts and failed-records files go.
 *
 * Output directory precedence: --out-dir, then config output_dir, then the
 * directory holding the input file.
 */
export function resolveOutputPaths(
    inputPath: string,
    config: LedgerConfig,
    outDir?: string,
    cwd: string = process.cwd()
): OutputPaths {
    const outputDir = resolve(cwd, outDir ?? config.output_dir ?? dirname(inputPath));

    return {
        outputDir,
        accountsPath: join(outputDir, config.accounts_file),
        failedPath: join(outputDir, config.failed_file),
    };
}
