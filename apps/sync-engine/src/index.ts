#!/usr/bin/env node
import { loadEnv } from './env';
import type { Env } from './env';
import { parseArgs } from 'util';
import { CatalogClientFactory } from './clients';
import { generateEncryptionKey } from './lib/encryption';
import { logger } from './lib/logger';
import { extractPlaylistId } from './lib/playlist-identity';
import { describeError } from './lib/sync-errors';
import { readCheckpointFile } from './services/checkpoint-store';
import { exportPlaylists, writeExport } from './services/playlist-export';
import { verifyPlaylists } from './services/playlist-verification';
import { runSyncJob } from './services/sync-job';
import { catalogNameSchema } from './types/catalog';
import type { CatalogName } from './types/catalog';

const USAGE = `Usage:
  playlist-sync [sync] [--force-replace] [--fresh] [--targets plex,spotify]
  playlist-sync export <catalog> --output <file> [--playlist <url-or-id>...]
  playlist-sync verify <catalog> [--input <file>]
  playlist-sync keygen`;

function parseCatalog(value: string | undefined): CatalogName {
    const parsed = catalogNameSchema.safeParse(value);
    if (!parsed.success) {
        throw new Error(`Unknown catalog "${value ?? ''}". ${USAGE}`);
    }
    return parsed.data;
}

async function main(argv: string[], signal: AbortSignal): Promise<number> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            'force-replace': { type: 'boolean' },
            fresh: { type: 'boolean' },
            targets: { type: 'string' },
            input: { type: 'string' },
            output: { type: 'string' },
            playlist: { type: 'string', multiple: true },
            help: { type: 'boolean', short: 'h' },
        },
    });

    if (values.help) {
        console.log(USAGE);
        return 0;
    }

    const [command = 'sync', catalogArg] = positionals;

    // Prints a TOKEN_CACHE_KEY value; needs no configuration
    if (command === 'keygen') {
        console.log(generateEncryptionKey());
        return 0;
    }

    const env: Env = loadEnv();
    const factory = new CatalogClientFactory(env, { signal });

    switch (command) {
        case 'sync': {
            const targets = values.targets
                ? values.targets.split(',').map(target => parseCatalog(target.trim()))
                : env.SYNC_TARGETS;
            const result = await runSyncJob({
                inputPath: values.input ?? env.SYNC_INPUT_PATH,
                outputPath: values.output ?? env.SYNC_OUTPUT_PATH,
                targets: targets.map(target => factory.create(target)),
                forceReplace: values['force-replace'] ?? env.SYNC_FORCE_REPLACE,
                fresh: values.fresh ?? env.SYNC_FRESH_START,
                concurrency: env.SYNC_CONCURRENCY,
                thresholds: {
                    minSimilarity: env.MATCH_MIN_SIMILARITY,
                    artistTitleSimilarity: env.MATCH_ARTIST_TITLE_SIMILARITY,
                },
                signal,
            });
            logger.info({ summary: result.total, output: result.outputPath }, 'Sync complete');
            return result.total.playlistsFailed > 0 ? 2 : 0;
        }
        case 'export': {
            const client = factory.create(parseCatalog(catalogArg));
            const playlistIds = values.playlist?.map(value => extractPlaylistId(value) ?? value);
            const document = await exportPlaylists(client, { playlistIds });
            const output = values.output ?? env.SYNC_INPUT_PATH;
            await writeExport(output, document);
            logger.info({ playlists: document.playlists.length, output }, 'Export complete');
            return 0;
        }
        case 'verify': {
            const client = factory.create(parseCatalog(catalogArg));
            const document = await readCheckpointFile(values.input ?? env.SYNC_OUTPUT_PATH);
            const report = await verifyPlaylists(document, client);
            for (const entry of report) {
                logger.info(
                    {
                        playlist: entry.name,
                        exists: entry.exists,
                        missing: entry.missing.length,
                        extra: entry.extra.length,
                        unresolved: entry.unresolved,
                    },
                    'Verification result'
                );
            }
            const mismatched = report.some(entry => !entry.exists || entry.missing.length > 0);
            return mismatched ? 2 : 0;
        }
        default:
            console.error(USAGE);
            return 1;
    }
}

const controller = new AbortController();

const shutdown = () => {
    logger.info('Cancellation requested, stopping at the next checkpoint');
    controller.abort();
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

main(process.argv.slice(2), controller.signal)
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        logger.error({ err: error }, describeError(error));
        process.exitCode = 1;
    })
    .finally(() => {
        process.off('SIGTERM', shutdown);
        process.off('SIGINT', shutdown);
    });
