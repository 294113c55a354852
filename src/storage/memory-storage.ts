import type { CollectionName, DurableStorage, LogName, VersionedRecord } from './types.js'
import { storedVersion } from './versioned.js'

function clone<T>(value: T): T {
    return structuredClone(value)
}

/** In-process storage; records are cloned on the way in and out. */
export class MemoryStorage implements DurableStorage {
    private logs = new Map<LogName, unknown[]>()
    private collections = new Map<CollectionName, Map<string, unknown>>()

    async append(log: LogName, record: unknown): Promise<void> {
        const lines = this.logs.get(log) ?? []
        lines.push(clone(record))
        this.logs.set(log, lines)
    }

    async readLog(log: LogName): Promise<unknown[]> {
        return (this.logs.get(log) ?? []).map(clone)
    }

    async readCollection(name: CollectionName): Promise<Record<string, unknown>> {
        const collection = this.collections.get(name)
        if (!collection) return {}
        return Object.fromEntries([...collection].map(([key, value]) => [key, clone(value)]))
    }

    async compareAndSwap(name: CollectionName, key: string, expectedVersion: number, record: VersionedRecord): Promise<boolean> {
        const collection = this.collections.get(name) ?? new Map<string, unknown>()
        if (storedVersion(collection.get(key)) !== expectedVersion) return false
        collection.set(key, clone(record))
        this.collections.set(name, collection)
        return true
    }
}
