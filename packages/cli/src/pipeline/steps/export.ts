import { mkdir, writeFile } from 'node:fs/promises';
import { formatAccountsCsv, formatFailedCsv } from '@ledger-engine/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Export
 * Writes the accounts and failed-records CSV files.
 */
export const exportResults: PipelineStep = async (state) => {
    if (!state.runResult) {
        return state;
    }

    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const { outputDir, accountsPath, failedPath } = state.outputs;

    try {
        await mkdir(outputDir, { recursive: true });
        await writeFile(accountsPath, formatAccountsCsv(state.runResult.accounts));
        await writeFile(failedPath, formatFailedCsv(state.runResult.failed));
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${outputDir}: ${(err as Error).message}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
