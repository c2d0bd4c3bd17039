import { serviceLoggers } from '../lib/logger';
import { AuthenticationExpiredError, describeError, isJobFatalError } from '../lib/sync-errors';
import type {
    CatalogClient,
    CatalogName,
    IndexedCatalogClient,
    RemoteTrack,
    SearchableCatalogClient,
    TrackDescriptor,
} from '../types/catalog';
import {
    DEFAULT_MATCH_THRESHOLDS,
    SEARCH_LEVELS,
    findBestMatch,
    normalizeTitle,
    prepareCandidates,
    similarity,
    simplifySearchQuery,
} from './track-matcher';
import type { MatchCandidate, MatchResult, MatchThresholds } from './track-matcher';

const log = serviceLoggers.resolver;

export interface EntityResolverOptions {
    thresholds?: Partial<MatchThresholds>;
}

/**
 * Maps a textual track description to a catalog identifier. Local-index
 * catalogs are listed once per resolver and matched in memory; search
 * catalogs go through progressively simplified queries.
 */
export class EntityResolver {
    private readonly thresholds: MatchThresholds;
    private readonly indexes = new Map<CatalogName, Promise<MatchCandidate[]>>();

    constructor(options: EntityResolverOptions = {}) {
        this.thresholds = { ...DEFAULT_MATCH_THRESHOLDS, ...options.thresholds };
    }

    async resolve(descriptor: TrackDescriptor, client: CatalogClient): Promise<MatchResult> {
        if (client.matching === 'local-index') {
            const candidates = await this.getIndex(client);
            const result = findBestMatch(descriptor, candidates, this.thresholds);
            log.debug({ catalog: client.name, title: descriptor.title, result }, 'Index match attempted');
            return result;
        }
        return this.searchProgressively(descriptor, client);
    }

    private getIndex(client: IndexedCatalogClient): Promise<MatchCandidate[]> {
        let index = this.indexes.get(client.name);
        if (!index) {
            index = this.loadIndex(client);
            this.indexes.set(client.name, index);
        }
        return index;
    }

    private async loadIndex(client: IndexedCatalogClient): Promise<MatchCandidate[]> {
        try {
            const tracks = await client.fetchTrackIndex();
            log.info({ catalog: client.name, tracks: tracks.length }, 'Track index loaded');
            return prepareCandidates(tracks);
        } catch (error) {
            // Not cached, so the next playlist tries again
            this.indexes.delete(client.name);
            throw error;
        }
    }

    private async searchProgressively(
        descriptor: TrackDescriptor,
        client: SearchableCatalogClient
    ): Promise<MatchResult> {
        for (const level of SEARCH_LEVELS) {
            const query = simplifySearchQuery(descriptor.title, descriptor.artist, level);
            if (!query) continue;

            let results: RemoteTrack[];
            try {
                results = await client.searchTracks(query, 1);
            } catch (error) {
                if (isJobFatalError(error) || error instanceof AuthenticationExpiredError) {
                    throw error;
                }
                log.warn(
                    { catalog: client.name, level, query, err: error },
                    `Search failed, trying next level: ${describeError(error)}`
                );
                continue;
            }

            const [top] = results;
            if (top) {
                const score = similarity(normalizeTitle(descriptor.title), normalizeTitle(top.title));
                log.debug({ catalog: client.name, level, query, catalogId: top.id }, 'Search matched');
                return { status: 'matched', catalogId: top.id, score, strategy: 'search', level };
            }
        }

        log.debug({ catalog: client.name, title: descriptor.title }, 'No search level matched');
        return { status: 'not_found', bestScore: 0, bestCandidateId: null };
    }
}
