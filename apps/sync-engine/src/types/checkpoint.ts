import { z } from 'zod';
import { catalogNameSchema } from './catalog';

export const CHECKPOINT_VERSION = 1;

// 'source': reference came with the input; integer: search simplification level
export const provenanceSchema = z.union([
    z.literal('source'),
    z.literal('reused'),
    z.literal('index'),
    z.number().int().min(0),
    z.null(),
]);
export type Provenance = z.infer<typeof provenanceSchema>;

export const trackEntrySchema = z.object({
    title: z.string(),
    artist: z.string().default(''),
    album: z.string().default(''),
    source: z.string().default(''),
    durationSeconds: z.number().nonnegative().optional(),
    refs: z.record(catalogNameSchema, z.string().nullable()).default({}),
    provenance: z.record(catalogNameSchema, provenanceSchema).default({}),
});
export type TrackEntry = z.infer<typeof trackEntrySchema>;

export const playlistStatusSchema = z.enum(['pending', 'in_progress', 'complete', 'failed']);
export type PlaylistStatus = z.infer<typeof playlistStatusSchema>;

export const playlistSyncStateSchema = z.object({
    playlistId: z.string().nullable().default(null),
    status: playlistStatusSchema.default('pending'),
    replaced: z.boolean().default(false),
    added: z.number().int().nonnegative().default(0),
    lastError: z.string().nullable().default(null),
});
export type PlaylistSyncState = z.infer<typeof playlistSyncStateSchema>;

export const playlistEntrySchema = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    catalogs: z.record(catalogNameSchema, playlistSyncStateSchema).default({}),
    tracks: z.array(trackEntrySchema).default([]),
});
export type PlaylistEntry = z.infer<typeof playlistEntrySchema>;

export const checkpointDocumentSchema = z.object({
    version: z.literal(CHECKPOINT_VERSION).default(CHECKPOINT_VERSION),
    playlists: z.array(playlistEntrySchema),
});
export type CheckpointDocument = z.infer<typeof checkpointDocumentSchema>;

export function createPlaylistSyncState(): PlaylistSyncState {
    return { playlistId: null, status: 'pending', replaced: false, added: 0, lastError: null };
}
