export interface OffsetPage<T> {
    items: T[];
    total?: number;
}

export interface LinkedPage<T> {
    items: T[];
    next: string | null;
}

// Stops on a short page, or once `total` is reached when the service reports it
export async function collectOffsetPages<T>(
    pageSize: number,
    fetchPage: (offset: number, limit: number) => Promise<OffsetPage<T>>
): Promise<T[]> {
    const collected: T[] = [];
    let offset = 0;

    for (;;) {
        const page = await fetchPage(offset, pageSize);
        collected.push(...page.items);
        offset += page.items.length;

        const reachedTotal = page.total !== undefined && offset >= page.total;
        if (page.items.length < pageSize || reachedTotal || page.items.length === 0) {
            return collected;
        }
    }
}

export async function collectLinkedPages<T>(
    firstUrl: string,
    fetchPage: (url: string) => Promise<LinkedPage<T>>
): Promise<T[]> {
    const collected: T[] = [];
    const seen = new Set<string>();
    let url: string | null = firstUrl;

    while (url !== null && !seen.has(url)) {
        seen.add(url);
        const page: LinkedPage<T> = await fetchPage(url);
        collected.push(...page.items);
        url = page.next;
    }

    return collected;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        batches.push(items.slice(i, i + size));
    }
    return batches;
}
