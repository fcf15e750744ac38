import { readFileSync, existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse } from 'yaml';
import { CONFIG_DEFAULTS, LedgerConfigSchema, type LedgerConfig } from '@ledger-engine/shared';

/**
 * Loads ledger.config.yaml.
 *
 * An explicitly named file must exist. Without one, the default file in
 * `cwd` is used if present, otherwise every setting takes its default.
 * A relative output_dir is resolved against the config file's directory.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): LedgerConfig {
    const path = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_DEFAULTS.FILENAME);

    if (!existsSync(path)) {
        if (configPath) {
            throw new Error(`Config file not found: ${path}`);
        }
        return LedgerConfigSchema.parse({});
    }

    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);

    const result = LedgerConfigSchema.safeParse(data ?? {});
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        throw new Error(`Invalid config ${path}: ${details}`);
    }

    const config = result.data;
    if (config.output_dir !== undefined) {
        return { ...config, output_dir: resolve(dirname(path), config.output_dir) };
    }
    return config;
}
