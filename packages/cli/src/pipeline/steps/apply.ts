import { runLedger } from '@ledger-engine/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Apply Transactions
 * Folds every parsed row into the ledger in input order.
 */
export const applyTransactions: PipelineStep = async (state) => {
    if (!state.parseResult) {
        return state;
    }

    state.runResult = runLedger(state.parseResult.rows, {
        allowRedispute: state.config.allow_redispute,
    });

    return state;
};
