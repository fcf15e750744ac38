import type { ProcessOptions } from './types.js';

export type CliCommand =
    | { kind: 'help' }
    | { kind: 'process'; inputPath: string; options: ProcessOptions }
    | { kind: 'invalid'; message: string };

const VALUE_FLAGS = {
    '--out-dir': 'outDir',
    '--config': 'config',
} as const;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
    return arg in VALUE_FLAGS;
}

/**
 * Parse `ledger <transactions.csv> [--out-dir <dir>] [--config <file>] [--dry-run]`.
 */
export function parseArgs(args: string[]): CliCommand {
    if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
        return { kind: 'help' };
    }

    const options: ProcessOptions = { dryRun: false };
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--dry-run') {
            options.dryRun = true;
        } else if (isValueFlag(arg)) {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { kind: 'invalid', message: `Missing value for ${arg}` };
            }
            options[VALUE_FLAGS[arg]] = value;
            i++;
        } else if (arg.startsWith('-')) {
            return { kind: 'invalid', message: `Unknown option: ${arg}` };
        } else {
            positional.push(arg);
        }
    }

    if (positional.length !== 1) {
        return { kind: 'invalid', message: `Expected exactly one input file, got ${positional.length}` };
    }

    return { kind: 'process', inputPath: positional[0], options };
}
