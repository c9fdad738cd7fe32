import type { Store } from "./Store";

export type MemoryStoreOptions = {
    maxSize?: number; // optional safety
};

/**
 * In-process {@link Store} for tests and local development.
 */
export class MemoryStore implements Store {
    private readonly map = new Map<string, Uint8Array>();

    constructor(private readonly options?: MemoryStoreOptions) {}

    async get(key: string): Promise<Uint8Array | null> {
        const value = this.map.get(key);
        if (!value) return null;
        return value.slice();
    }

    async put(key: string, value: Uint8Array): Promise<void> {
        const maxSize = this.options?.maxSize;
        if (maxSize && !this.map.has(key) && this.map.size >= maxSize) {
            const firstKey = this.map.keys().next().value;
            if (firstKey !== undefined) this.map.delete(firstKey);
        }

        this.map.set(key, value.slice());
    }

    get size(): number {
        return this.map.size;
    }
}
