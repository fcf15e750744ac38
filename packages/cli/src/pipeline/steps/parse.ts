import { parseTransactions } from '@ledger-engine/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Parsing
 * Turns the file contents into parsed rows. Bad rows travel on as parse
 * failures; only an unusable header stops the run.
 */
export const parseInput: PipelineStep = async (state) => {
    if (state.content === undefined) {
        return state;
    }

    try {
        const result = parseTransactions(state.content);
        state.parseResult = result;

        // Forward parser warnings to pipeline state
        for (const warning of result.warnings) {
            state.warnings.push(`[parse] ${warning}`);
        }

        if (result.rows.length === 0) {
            state.warnings.push('No transactions found in the input file.');
        }
    } catch (err) {
        state.errors.push({
            step: 'parse',
            message: `Failed to parse ${state.inputPath}: ${(err as Error).message}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
