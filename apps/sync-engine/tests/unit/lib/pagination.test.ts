import { chunk, collectLinkedPages, collectOffsetPages } from '../../../src/lib/pagination';

describe('collectOffsetPages', () => {
    const items = Array.from({ length: 5 }, (_, i) => i);

    it('should stop on a short page', async () => {
        const offsets: number[] = [];
        const result = await collectOffsetPages(2, async (offset, limit) => {
            offsets.push(offset);
            return { items: items.slice(offset, offset + limit) };
        });

        expect(result).toEqual([0, 1, 2, 3, 4]);
        expect(offsets).toEqual([0, 2, 4]);
    });

    it('should stop once the reported total is reached', async () => {
        const offsets: number[] = [];
        const result = await collectOffsetPages(5, async offset => {
            offsets.push(offset);
            return { items: items.slice(offset, offset + 5), total: 5 };
        });

        expect(result).toEqual(items);
        expect(offsets).toEqual([0]);
    });

    it('should stop on an empty page', async () => {
        const result = await collectOffsetPages(5, async offset => ({ items: offset === 0 ? items : [] }));

        expect(result).toEqual(items);
    });
});

describe('collectLinkedPages', () => {
    it('should follow next links until there are none', async () => {
        const pages: Record<string, { items: string[]; next: string | null }> = {
            '/page/1': { items: ['a', 'b'], next: '/page/2' },
            '/page/2': { items: ['c'], next: null },
        };

        await expect(collectLinkedPages('/page/1', async url => pages[url])).resolves.toEqual(['a', 'b', 'c']);
    });

    it('should not loop on a repeated link', async () => {
        let calls = 0;
        const result = await collectLinkedPages('/page/1', async () => {
            calls++;
            return { items: ['x'], next: '/page/1' };
        });

        expect(result).toEqual(['x']);
        expect(calls).toBe(1);
    });
});

describe('chunk', () => {
    it('should split into batches of at most the given size', () => {
        expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    });

    it('should return no batches for no items', () => {
        expect(chunk([], 3)).toEqual([]);
    });
});
