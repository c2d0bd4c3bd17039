import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type { RemoteTrack } from '../types/catalog';

export interface MatchThresholds {
    // Floor for any fuzzy match
    minSimilarity: number;
    // Title similarity required once an "Artist - Title" artist is confirmed
    artistTitleSimilarity: number;
}

export const DEFAULT_MATCH_THRESHOLDS: MatchThresholds = {
    minSimilarity: 0.6,
    artistTitleSimilarity: 0.8,
};

export const SEARCH_LEVELS = [0, 1, 2, 3, 4] as const;
export type SearchLevel = (typeof SEARCH_LEVELS)[number];

export type MatchStrategy = 'exact' | 'artist-title' | 'fuzzy-title' | 'fuzzy-combined' | 'search';

export type MatchResult =
    | { status: 'matched'; catalogId: string; score: number; strategy: MatchStrategy; level?: SearchLevel }
    | { status: 'not_found'; bestScore: number; bestCandidateId: string | null };

export interface MatchCandidate {
    track: RemoteTrack;
    normalizedTitle: string;
    normalizedArtist: string;
}

const AUDIO_EXTENSION = /\.(mp3|flac|wav|aac|ogg|wma|m4a)$/i;
const TRACK_NUMBER_PREFIX = /^\d{1,3}(?:\s*[-._)]\s*|\s+)/;
const ARTIST_TITLE_SEPARATOR = /\s+[-–—]\s+/;

export function normalizeString(str: string): string {
    return str
        .toLowerCase()
        .replace(/[^\w\s]/g, '') // Remove special characters
        .replace(/\s+/g, ' ')    // Normalize whitespace
        .trim();
}

function stripFileNoise(title: string): string {
    return title.trim().replace(AUDIO_EXTENSION, '').replace(TRACK_NUMBER_PREFIX, '');
}

export function normalizeTitle(title: string): string {
    return stripFileNoise(title)
        .replace(/\([^)]*\)/g, ' ')
        .replace(/\[[^\]]*\]/g, ' ')
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

export function similarity(a: string, b: string): number {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) return 1;
    return 1 - levenshteinDistance(a, b) / longest;
}

export function splitArtistTitle(title: string): { artist: string; title: string } | null {
    const cleaned = stripFileNoise(title);
    const match = ARTIST_TITLE_SEPARATOR.exec(cleaned);
    if (!match) return null;

    const artist = cleaned.slice(0, match.index).trim();
    const rest = cleaned.slice(match.index + match[0].length).trim();
    if (!artist || !rest) return null;
    return { artist, title: rest };
}

export function prepareCandidates(tracks: readonly RemoteTrack[]): MatchCandidate[] {
    return tracks.map(track => ({
        track,
        normalizedTitle: normalizeTitle(track.title),
        normalizedArtist: normalizeString(track.artist),
    }));
}

/**
 * Matches a track description against a local index:
 * exact normalized title, then an "Artist - Title" split with artist
 * confirmation, then best fuzzy title, then combined artist+title similarity.
 */
export function findBestMatch(
    query: { title: string; artist: string },
    candidates: readonly MatchCandidate[],
    thresholds: MatchThresholds = DEFAULT_MATCH_THRESHOLDS
): MatchResult {
    const normalized = normalizeTitle(query.title);
    if (!normalized || candidates.length === 0) {
        return { status: 'not_found', bestScore: 0, bestCandidateId: null };
    }

    const exact = candidates.find(candidate => candidate.normalizedTitle === normalized);
    if (exact) {
        return { status: 'matched', catalogId: exact.track.id, score: 1, strategy: 'exact' };
    }

    let best: { candidate: MatchCandidate; score: number; strategy: MatchStrategy } | null = null;
    const closest: { score: number; id: string | null } = { score: 0, id: null };

    const note = (candidate: MatchCandidate, score: number) => {
        if (closest.id === null || score > closest.score) {
            closest.score = score;
            closest.id = candidate.track.id;
        }
    };

    const split = splitArtistTitle(query.title);
    const splitTitle = split ? normalizeTitle(split.title) : null;

    if (split && splitTitle) {
        const splitArtist = normalizeString(split.artist);
        for (const candidate of candidates) {
            if (!splitArtist || !candidate.normalizedArtist.includes(splitArtist)) continue;
            const score = similarity(splitTitle, candidate.normalizedTitle);
            note(candidate, score);
            if (score > thresholds.artistTitleSimilarity && (!best || score > best.score)) {
                best = { candidate, score, strategy: 'artist-title' };
            }
        }
    }

    if (!best) {
        for (const candidate of candidates) {
            const score = similarity(normalized, candidate.normalizedTitle);
            note(candidate, score);
            if (score >= thresholds.minSimilarity && (!best || score > best.score)) {
                best = { candidate, score, strategy: 'fuzzy-title' };
            }
        }
    }

    const artistText = normalizeString(query.artist || split?.artist || '');
    if (artistText) {
        const combinedQuery = `${artistText} ${splitTitle ?? normalized}`;
        for (const candidate of candidates) {
            const score = similarity(combinedQuery, `${candidate.normalizedArtist} ${candidate.normalizedTitle}`);
            note(candidate, score);
            if (score >= thresholds.minSimilarity && (!best || score > best.score)) {
                best = { candidate, score, strategy: 'fuzzy-combined' };
            }
        }
    }

    if (best) {
        return { status: 'matched', catalogId: best.candidate.track.id, score: best.score, strategy: best.strategy };
    }

    return { status: 'not_found', bestScore: closest.score, bestCandidateId: closest.id };
}

function stripAccents(value: string): string {
    return value.normalize('NFKD').replace(/[\u0300-\u036f]/g, '');
}

const MAX_QUERY_LENGTH = 100;

/**
 * Builds the search query for a simplification level:
 * 0 full text, 1 without parentheses, 2 title cut at ":" or "-",
 * 3 first artist only, 4 title only.
 */
export function simplifySearchQuery(title: string, artist: string, level: SearchLevel): string {
    let simplifiedTitle = stripAccents(title).replace(/\//g, ' ');
    let simplifiedArtist = stripAccents(artist).replace(/\//g, ' ');

    if (level >= 1) {
        simplifiedTitle = simplifiedTitle.replace(/\(.*?\)/g, '');
    }
    if (level >= 2) {
        simplifiedTitle = simplifiedTitle.split(/[:-]/)[0];
    }
    if (level >= 3) {
        simplifiedArtist = simplifiedArtist.split(',')[0];
    }

    const query = level >= 4 ? simplifiedTitle : `${simplifiedTitle} ${simplifiedArtist}`;
    return query
        .replace(/[":[\]()']/g, ' ')
        .replace(/\s+/g, ' ')
        .trim()
        .slice(0, MAX_QUERY_LENGTH);
}

export function generateCacheKey(trackName: string, artistName: string, albumName = ''): string {
    return `${normalizeString(trackName)}::${normalizeString(artistName)}::${normalizeString(albumName)}`;
}
