import type { CatalogName } from './catalog';

// Indexed by search level
export const SEARCH_CATEGORIES = ['level0', 'level1', 'level2', 'level3', 'level4'] as const;

export const RESOLUTION_CATEGORIES = ['existing', 'reused', 'index', ...SEARCH_CATEGORIES] as const;

export type ResolutionCategory = (typeof RESOLUTION_CATEGORIES)[number];

export interface SyncSummary {
    playlistsProcessed: number;
    playlistsFailed: number;
    tracksResolved: Record<ResolutionCategory, number>;
    tracksUnresolved: number;
    tracksAdded: number;
    batchesApplied: number;
    batchesFailed: number;
}

export interface SyncJobResult {
    outputPath: string;
    resumed: boolean;
    catalogs: Partial<Record<CatalogName, SyncSummary>>;
    total: SyncSummary;
}

export function createSyncSummary(): SyncSummary {
    return {
        playlistsProcessed: 0,
        playlistsFailed: 0,
        tracksResolved: {
            existing: 0,
            reused: 0,
            index: 0,
            level0: 0,
            level1: 0,
            level2: 0,
            level3: 0,
            level4: 0,
        },
        tracksUnresolved: 0,
        tracksAdded: 0,
        batchesApplied: 0,
        batchesFailed: 0,
    };
}

export function mergeSummaries(summaries: readonly SyncSummary[]): SyncSummary {
    const total = createSyncSummary();
    for (const summary of summaries) {
        total.playlistsProcessed += summary.playlistsProcessed;
        total.playlistsFailed += summary.playlistsFailed;
        total.tracksUnresolved += summary.tracksUnresolved;
        total.tracksAdded += summary.tracksAdded;
        total.batchesApplied += summary.batchesApplied;
        total.batchesFailed += summary.batchesFailed;
        for (const category of RESOLUTION_CATEGORIES) {
            total.tracksResolved[category] += summary.tracksResolved[category];
        }
    }
    return total;
}
