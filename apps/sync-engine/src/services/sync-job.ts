import pLimit from 'p-limit';
import type { RenameFn } from '../lib/atomic-file';
import { workerLoggers } from '../lib/logger';
import { JobCancelledError } from '../lib/sync-errors';
import type { CatalogClient, CatalogName } from '../types/catalog';
import { mergeSummaries } from '../types/sync';
import type { SyncJobResult, SyncSummary } from '../types/sync';
import { processCatalog } from '../workers/catalog-worker';
import { DEFAULT_CONCURRENCY } from '../workers/worker-config';
import { CheckpointStore } from './checkpoint-store';
import { EntityResolver } from './entity-resolver';
import { JobContext } from './job-context';
import type { MatchThresholds } from './track-matcher';

const log = workerLoggers.job;

export interface SyncJobOptions {
    inputPath: string;
    outputPath: string;
    targets: CatalogClient[];
    forceReplace?: boolean;
    // Discard <output>.part instead of resuming from it
    fresh?: boolean;
    concurrency?: number;
    thresholds?: Partial<MatchThresholds>;
    signal?: AbortSignal;
    rename?: RenameFn;
}

export async function runSyncJob(options: SyncJobOptions): Promise<SyncJobResult> {
    const store = new CheckpointStore({
        inputPath: options.inputPath,
        outputPath: options.outputPath,
        rename: options.rename,
    });
    const { document, resumed } = await store.load({ fresh: options.fresh });
    // One worker's fatal error stops the others at their next checkpoint boundary
    const controller = new AbortController();
    const cancel = () => controller.abort();
    if (options.signal?.aborted) {
        cancel();
    }
    options.signal?.addEventListener('abort', cancel, { once: true });

    const context = new JobContext({ document, store, resumed, signal: controller.signal });
    if (!resumed) {
        // Recreations recorded by an earlier job do not protect a playlist from this one
        await context.commit(current => {
            for (const playlist of current.playlists) {
                for (const state of Object.values(playlist.catalogs)) {
                    if (state) {
                        state.replaced = false;
                    }
                }
            }
        });
    }
    const resolver = new EntityResolver({ thresholds: options.thresholds });
    const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY));

    log.info(
        { targets: options.targets.map(client => client.name), playlists: document.playlists.length, resumed },
        'Sync job started'
    );

    const settled = await Promise.allSettled(
        options.targets.map(client =>
            limit(async () => {
                try {
                    return await processCatalog(client, resolver, context, {
                        forceReplace: options.forceReplace ?? false,
                    });
                } catch (error) {
                    cancel();
                    throw error;
                }
            })
        )
    );
    options.signal?.removeEventListener('abort', cancel);

    const failures: unknown[] = settled.flatMap(outcome => (outcome.status === 'rejected' ? [outcome.reason] : []));
    if (failures.length > 0) {
        // The checkpoint stays at <output>.part for a later resume
        const cause = failures.find(reason => !(reason instanceof JobCancelledError)) ?? failures[0];
        log.error({ err: cause }, 'Sync job aborted');
        throw cause;
    }

    const catalogs: Partial<Record<CatalogName, SyncSummary>> = {};
    const summaries: SyncSummary[] = [];
    for (const [index, outcome] of settled.entries()) {
        if (outcome.status === 'fulfilled') {
            catalogs[options.targets[index].name] = outcome.value;
            summaries.push(outcome.value);
        }
    }

    await context.finalize();
    const total = mergeSummaries(summaries);
    log.info({ total }, 'Sync job finished');

    return { outputPath: options.outputPath, resumed, catalogs, total };
}
