#!/usr/bin/env node
import 'dotenv/config';

import { parseArgs } from 'util';
import env from './util/env';
import logger from './util/logger';
import { OutputFormat, OutputFormatSchema } from './util/config';
import { ConfigError, SinkError, errorMessage } from './util/errors';
import { Checkpoint } from './util/checkpoint';
import { resolveIdentifiers } from './identifiers';
import { scrapeAll, RunSummary } from './orchestrator';
import { createSink, inferFormat } from './output/sink';
import { PeopleDirectory, PeopleScraper } from './scraper/people';
import { TargetKind, createScraper } from './scraper/targets';
import Scraper from './scraper/scraper.interface';
import { warnIfAboveRequestLimit } from './util/queues';

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_SINK_ERROR = 2;
export const EXIT_INTERRUPTED = 130;

export const USAGE = `Usage: malscrape [ids...] [options]

Scrape anime (or, with --people, person) pages from MyAnimeList by MAL ID.

Options:
  -o, --output <path>      Output file (default: config outputPath, then $OUTPUT_PATH;
                           $PEOPLE_OUTPUT_PATH with --people)
  -c, --config <path>      YAML config with malIds/peopleIds/outputPath (default: $CONFIG_PATH if present)
  -f, --format <format>    jsonl | json (default: from the output file extension)
      --people             Scrape person pages; without ids, crawl the people directory
      --letters <letters>  Directory letters to crawl with --people, e.g. ABC (default: A-Z)
      --concurrency <n>    Identifiers fetched at once. Requests in flight never
                           exceed $SCRAPE_CONCURRENCY, whatever this is set to
      --checkpoint <path>  Record completed IDs and skip them on the next run;
                           a resumed run appends to the output file
      --no-resume          Ignore an existing checkpoint
  -h, --help               Show this help`;

export interface CliOptions {
    ids: string[];
    output?: string;
    config?: string;
    format?: OutputFormat;
    concurrency?: number;
    checkpoint?: string;
    resume: boolean;
    people: boolean;
    letters?: string[];
    help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
    let parsed: ReturnType<typeof parseCommandLine>;
    try {
        parsed = parseCommandLine(argv);
    } catch (e) {
        throw new ConfigError(errorMessage(e));
    }
    const { values, positionals } = parsed;

    let format: OutputFormat | undefined;
    if (values.format !== undefined) {
        const result = OutputFormatSchema.safeParse(values.format);
        if (!result.success) {
            throw new ConfigError(`Invalid --format: ${values.format} (expected jsonl or json)`);
        }
        format = result.data;
    }

    let concurrency: number | undefined;
    if (values.concurrency !== undefined) {
        concurrency = Number(values.concurrency);
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new ConfigError(`Invalid --concurrency: ${values.concurrency}`);
        }
    }

    const people = values.people ?? false;
    let letters: string[] | undefined;
    if (values.letters !== undefined) {
        if (!people) {
            throw new ConfigError('--letters only applies with --people');
        }
        letters = values.letters.toUpperCase().replace(/[\s,]/g, '').split('');
        if (letters.length === 0 || letters.some(letter => letter < 'A' || letter > 'Z')) {
            throw new ConfigError(`Invalid --letters: ${values.letters}`);
        }
    }

    return {
        ids: positionals,
        output: values.output,
        config: values.config,
        format,
        concurrency,
        checkpoint: values.checkpoint,
        resume: !values['no-resume'],
        people,
        letters,
        help: values.help ?? false,
    };
}

function parseCommandLine(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            output: { type: 'string', short: 'o' },
            config: { type: 'string', short: 'c' },
            format: { type: 'string', short: 'f' },
            concurrency: { type: 'string' },
            checkpoint: { type: 'string' },
            'no-resume': { type: 'boolean' },
            people: { type: 'boolean' },
            letters: { type: 'string' },
            help: { type: 'boolean', short: 'h' },
        },
    });
}

export interface CliDependencies {
    createScraper?: (kind: TargetKind) => Scraper<object>;
    createPeopleDirectory?: () => PeopleDirectory;
    signal?: AbortSignal;
}

/**
 * Runs one scrape from command-line arguments and returns the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (e) {
        console.error(`${errorMessage(e)}\n\n${USAGE}`);
        return EXIT_CONFIG_ERROR;
    }

    if (options.help) {
        console.log(USAGE);
        return EXIT_OK;
    }

    const kind: TargetKind = options.people ? 'people' : 'anime';

    let summary: RunSummary;
    try {
        const resolved = resolveIdentifiers({
            cliIds: options.ids,
            configPath: options.config ?? env.CONFIG_PATH,
            configRequired: options.config !== undefined,
            kind,
            allowEmpty: kind === 'people',
        });
        const { config } = resolved;

        const outputPath = options.output ?? (kind === 'people' ? env.PEOPLE_OUTPUT_PATH : config.outputPath ?? env.OUTPUT_PATH);
        const format = options.format ?? config.format ?? inferFormat(outputPath);
        const concurrency = options.concurrency ?? config.concurrency ?? env.SCRAPE_CONCURRENCY;
        warnIfAboveRequestLimit(concurrency);

        const checkpointPath = options.checkpoint ?? config.checkpoint?.path;
        const checkpoint = checkpointPath
            ? await Checkpoint.load(checkpointPath, {
                saveInterval: config.checkpoint?.saveInterval,
                resume: options.resume && (config.checkpoint?.resume ?? true),
            })
            : undefined;

        let ids = resolved.ids;
        if (ids.length === 0) {
            logger.info(`Crawling the people directory (${(options.letters ?? ['A-Z']).join('')})`);
            const directory = deps.createPeopleDirectory?.() ?? new PeopleScraper();
            ids = await directory.listPeopleIds(options.letters, deps.signal);
        } else {
            logger.info(`Starting scraping for ${kind} IDs: ${ids.join(', ')}`);
        }

        // A resumed run adds to what the earlier run wrote
        const mode = checkpoint && checkpoint.completedCount > 0 ? 'append' : 'truncate';

        summary = await scrapeAll(ids, {
            scraper: deps.createScraper?.(kind) ?? createScraper(kind),
            sink: createSink(outputPath, format, mode),
            concurrency,
            signal: deps.signal,
            checkpoint,
        });

        logger.info(`Scraping completed. Data saved to ${outputPath}`);
    } catch (e) {
        if (e instanceof ConfigError) {
            logger.error(e.message);
            e.issues.forEach(issue => logger.error(`- ${issue}`));
            return EXIT_CONFIG_ERROR;
        }
        if (e instanceof SinkError) {
            logger.error({ err: e }, 'Output failed; run aborted');
            return EXIT_SINK_ERROR;
        }
        throw e;
    }

    return summary.cancelled > 0 || deps.signal?.aborted ? EXIT_INTERRUPTED : EXIT_OK;
}

export async function main(): Promise<void> {
    const controller = new AbortController();
    const interrupt = (signal: NodeJS.Signals) => {
        logger.warn(`Received ${signal}: finishing in-flight requests, no new ones will start`);
        controller.abort();
    };
    process.once('SIGINT', interrupt);
    process.once('SIGTERM', interrupt);

    try {
        process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
    } finally {
        process.off('SIGINT', interrupt);
        process.off('SIGTERM', interrupt);
    }
}

if (require.main === module) {
    main().catch((e) => {
        logger.fatal({ err: e }, 'Unexpected failure');
        process.exitCode = EXIT_CONFIG_ERROR;
    });
}
