import { Config, loadConfig, parseConfig } from './util/config';
import { ConfigError } from './util/errors';
import { TargetKind } from './scraper/targets';

export interface IdentifierSourceOptions {
    /** Raw positional values from the command line. */
    cliIds?: Array<string | number>;
    /** Config file to read `malIds` from. */
    configPath?: string;
    /** Whether a missing config file is an error (true when the user named it explicitly). */
    configRequired?: boolean;
    /** Which config list to read: `malIds` or `peopleIds`. Defaults to anime. */
    kind?: TargetKind;
    /** Return an empty list instead of failing when no ids are given. */
    allowEmpty?: boolean;
}

export interface ResolvedIdentifiers {
    ids: number[];
    config: Config;
}

export function parseIdentifier(value: string | number): number {
    const id = typeof value === 'number' ? value : /^\d+$/.test(value.trim()) ? Number(value.trim()) : NaN;
    if (!Number.isSafeInteger(id) || id <= 0) {
        throw new ConfigError(`Invalid ID: ${value}`);
    }
    return id;
}

/**
 * Keeps the first occurrence of every id, in order.
 */
export function dedupeIdentifiers(ids: number[]): number[] {
    return [...new Set(ids)];
}

/**
 * Config ids first, then command-line ids, deduplicated.
 * Throws ConfigError when nothing is left to scrape, unless `allowEmpty` is set.
 */
export function resolveIdentifiers(options: IdentifierSourceOptions): ResolvedIdentifiers {
    const config = options.configPath
        ? loadConfig(options.configPath, { required: options.configRequired })
        : parseConfig({}, 'defaults');

    const cliIds = (options.cliIds ?? []).map(parseIdentifier);
    const configIds = options.kind === 'people' ? config.peopleIds : config.malIds;
    const ids = dedupeIdentifiers([...configIds, ...cliIds]);

    if (ids.length === 0 && !options.allowEmpty) {
        throw new ConfigError('No MAL IDs provided via config or command line');
    }

    return { ids, config };
}
