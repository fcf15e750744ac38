import { readFile } from 'node:fs/promises';
import type { PipelineStep } from '../types.js';

/**
 * Step 1: Read Input
 * Loads the transactions file. Without readable input nothing downstream
 * is meaningful, so failure is fatal.
 */
export const readInput: PipelineStep = async (state) => {
    try {
        state.content = await readFile(state.inputPath, 'utf-8');
    } catch (err) {
        state.errors.push({
            step: 'read',
            message: `Failed to read ${state.inputPath}: ${(err as Error).message}`,
            fatal: true,
            error: err,
        });
    }
    return state;
};
