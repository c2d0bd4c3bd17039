const PLAYLIST_ID_PATTERN = /(?:playlist\/|playlist:)([a-zA-Z0-9-]+)/;

// Accepts share URLs (https://open.spotify.com/playlist/<id>?si=...) and URIs (spotify:playlist:<id>)
export function extractPlaylistId(input: string): string | null {
    const match = PLAYLIST_ID_PATTERN.exec(input.trim());
    return match ? match[1] : null;
}

export function sanitizePlaylistName(name: string): string {
    return name
        .replace(/[^\w\- ]/g, ' ')
        .replace(/ +/g, ' ')
        .trim();
}

export function playlistNamesMatch(a: string, b: string): boolean {
    return sanitizePlaylistName(a).toLowerCase() === sanitizePlaylistName(b).toLowerCase();
}
