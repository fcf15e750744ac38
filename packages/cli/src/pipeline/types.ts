import type { LedgerConfig, LedgerRunResult, TransactionParseResult } from '@ledger-engine/shared';
import type { OutputPaths, ProcessOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the processing pipeline.
 */
export interface PipelineState {
    inputPath: string;
    config: LedgerConfig;
    outputs: OutputPaths;
    options: ProcessOptions;

    // Accumulated during pipeline execution
    content?: string;
    parseResult?: TransactionParseResult;
    runResult?: LedgerRunResult;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
