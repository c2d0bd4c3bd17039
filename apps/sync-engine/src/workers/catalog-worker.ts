import { workerLoggers } from '../lib/logger';
import type { EntityResolver } from '../services/entity-resolver';
import type { JobContext } from '../services/job-context';
import { ReconciliationEngine } from '../services/reconciliation-engine';
import type { ReconcileOptions } from '../services/reconciliation-engine';
import type { CatalogClient } from '../types/catalog';
import { createSyncSummary } from '../types/sync';
import type { SyncSummary } from '../types/sync';

/**
 * Runs every playlist of the job against one catalog, in document order.
 * Playlist failures are recorded and skipped; job-fatal errors propagate.
 */
export async function processCatalog(
    client: CatalogClient,
    resolver: EntityResolver,
    context: JobContext,
    options: ReconcileOptions
): Promise<SyncSummary> {
    const log = workerLoggers.catalog(client.name);
    const summary = createSyncSummary();
    const engine = new ReconciliationEngine(client, resolver, context, summary, options);

    log.info({ playlists: context.document.playlists.length }, 'Catalog sync started');

    for (const playlist of context.document.playlists) {
        context.throwIfCancelled();
        const outcome = await engine.reconcilePlaylist(playlist);
        log.debug({ playlist: playlist.name, outcome }, 'Playlist processed');
    }

    log.info({ summary }, 'Catalog sync finished');
    return summary;
}
