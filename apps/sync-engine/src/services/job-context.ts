import { Mutex } from '../lib/mutex';
import { throwIfCancelled } from '../lib/timers';
import type { CheckpointDocument } from '../types/checkpoint';
import type { CheckpointStore } from './checkpoint-store';
import { CrossReferenceMap } from './cross-reference';

export interface JobContextOptions {
    document: CheckpointDocument;
    store: CheckpointStore;
    resumed: boolean;
    signal?: AbortSignal;
}

// State shared by every catalog worker of one job; all mutations go through commit()
export class JobContext {
    readonly document: CheckpointDocument;
    readonly crossReference: CrossReferenceMap;
    readonly resumed: boolean;
    readonly signal: AbortSignal | undefined;
    private readonly store: CheckpointStore;
    private readonly lock = new Mutex();

    constructor(options: JobContextOptions) {
        this.document = options.document;
        this.store = options.store;
        this.resumed = options.resumed;
        this.signal = options.signal;
        this.crossReference = CrossReferenceMap.fromDocument(options.document);
    }

    // Applies one mutation and writes the checkpoint before the next mutation starts
    commit<T>(mutate: (document: CheckpointDocument) => T): Promise<T> {
        return this.lock.runExclusive(async () => {
            const result = mutate(this.document);
            await this.store.save(this.document);
            return result;
        });
    }

    finalize(): Promise<void> {
        return this.lock.runExclusive(() => this.store.finalize(this.document));
    }

    throwIfCancelled(): void {
        throwIfCancelled(this.signal);
    }
}
