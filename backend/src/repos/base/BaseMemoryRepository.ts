/**
 * Keyed in-memory store behind the translation cache and terminology repositories.
 *
 * Raw keys pass through `keyOf` before every access, so a subclass that matches on a
 * normalized form (terminology labels) and one that matches exactly (content hashes) share
 * the same read/write path. Values iterate in insertion order.
 */
export abstract class BaseMemoryRepository<TValue> {
    private readonly records = new Map<string, TValue>()

    /** Storage key for a caller-supplied key; identity unless overridden. */
    protected keyOf(raw: string): string {
        return raw
    }

    protected lookup(raw: string): TValue | undefined {
        return this.records.get(this.keyOf(raw))
    }

    protected store(raw: string, value: TValue): void {
        this.records.set(this.keyOf(raw), value)
    }

    /**
     * Store only when the key is unused. Returns false for an empty key or an occupied one.
     */
    protected storeIfAbsent(raw: string, value: TValue): boolean {
        const key = this.keyOf(raw)
        if (!key || this.records.has(key)) return false
        this.records.set(key, value)
        return true
    }

    protected storedValues(): TValue[] {
        return [...this.records.values()]
    }

    /** Drop every entry (tests and long-lived processes). */
    clear(): void {
        this.records.clear()
    }

    size(): number {
        return this.records.size
    }
}
