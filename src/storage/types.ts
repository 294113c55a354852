export type LogName = 'canon-history' | 'buffer' | 'disputes' | 'task-memory'

export type CollectionName = 'canon'

export interface VersionedRecord {
    version: number
}

/**
 * Keyed storage with atomic append for logs and compare-and-swap replace for
 * versioned collections. Implementations throw StorageFailureError.
 */
export interface DurableStorage {
    append(log: LogName, record: unknown): Promise<void>
    readLog(log: LogName): Promise<unknown[]>
    readCollection(name: CollectionName): Promise<Record<string, unknown>>
    /**
     * Installs `record` under `key` only if the stored version equals
     * `expectedVersion` (0 when absent). Returns false on mismatch.
     */
    compareAndSwap(name: CollectionName, key: string, expectedVersion: number, record: VersionedRecord): Promise<boolean>
}
