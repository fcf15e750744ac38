import type { LedgerConfig } from '@ledger-engine/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { readInput } from './steps/read.js';
import { parseInput } from './steps/parse.js';
import { applyTransactions } from './steps/apply.js';
import { exportResults } from './steps/export.js';
import { resolveOutputPaths } from '../workspace/paths.js';
import { arrow, error } from '../utils/console.js';
import type { ProcessOptions } from '../types.js';

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    inputPath: string,
    config: LedgerConfig,
    options: ProcessOptions
): Promise<PipelineState> {
    let state: PipelineState = {
        inputPath,
        config,
        outputs: resolveOutputPaths(inputPath, config, options.outDir),
        options,
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Read Input', fn: readInput },
        { name: 'Parsing', fn: parseInput },
        { name: 'Apply Transactions', fn: applyTransactions },
        { name: 'Export Results', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
