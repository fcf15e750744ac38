/**
 * Ledger CLI - Core Types
 */

export interface ProcessOptions {
    dryRun: boolean;
    outDir?: string;
    config?: string;
}

export interface OutputPaths {
    outputDir: string;
    accountsPath: string;
    failedPath: string;
}
