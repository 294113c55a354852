import { randomUUID } from 'node:crypto'
import path from 'node:path'
import { z } from 'zod'
import { errorMessage, StorageFailureError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { KeyedMutex } from '../core/mutex.js'
import type { Logger } from '../logger/index.js'
import type { CollectionName, DurableStorage, LogName, VersionedRecord } from './types.js'
import { storedVersion } from './versioned.js'

const CollectionSchema = z.record(z.unknown())

/**
 * JSONL logs and JSON snapshots under one directory. Snapshots are replaced by
 * writing a temp file and renaming it over the old one.
 */
export class FileStorage implements DurableStorage {
    private locks = new KeyedMutex()

    constructor(
        private fs: FileSystem,
        private baseDir: string,
        private logger: Logger
    ) {}

    async append(log: LogName, record: unknown): Promise<void> {
        const line = `${JSON.stringify(record)}\n`
        await this.guard(`append ${log}`, () => this.fs.appendText(this.logPath(log), line))
    }

    async readLog(log: LogName): Promise<unknown[]> {
        const filePath = this.logPath(log)
        const text = await this.guard(`read ${log}`, async () => ((await this.fs.exists(filePath)) ? this.fs.readText(filePath) : ''))

        const records: unknown[] = []
        for (const [index, line] of text.split('\n').entries()) {
            const trimmed = line.trim()
            if (!trimmed) continue
            try {
                records.push(JSON.parse(trimmed))
            } catch {
                this.logger.warn({ log, line: index + 1 }, 'storage:skip-corrupt-line')
            }
        }
        return records
    }

    async readCollection(name: CollectionName): Promise<Record<string, unknown>> {
        return this.guard(`read ${name}`, () => this.loadCollection(name))
    }

    async compareAndSwap(name: CollectionName, key: string, expectedVersion: number, record: VersionedRecord): Promise<boolean> {
        return this.locks.runExclusive(name, () =>
            this.guard(`replace ${name}/${key}`, async () => {
                const collection = await this.loadCollection(name)
                if (storedVersion(collection[key]) !== expectedVersion) return false

                const target = this.collectionPath(name)
                const tmp = `${target}.${randomUUID()}.tmp`
                await this.fs.writeJSON(tmp, { ...collection, [key]: record })
                await this.fs.rename(tmp, target)
                return true
            })
        )
    }

    private async loadCollection(name: CollectionName): Promise<Record<string, unknown>> {
        const filePath = this.collectionPath(name)
        if (!(await this.fs.exists(filePath))) return {}
        const parsed = CollectionSchema.safeParse(await this.fs.readJSON(filePath))
        if (!parsed.success) {
            throw new StorageFailureError(`Collection '${name}' is not a JSON object`)
        }
        return parsed.data
    }

    private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn()
        } catch (error) {
            if (error instanceof StorageFailureError) throw error
            throw new StorageFailureError(`Storage ${operation} failed: ${errorMessage(error)}`, { cause: error })
        }
    }

    private logPath(log: LogName): string {
        return path.join(this.baseDir, `${log}.jsonl`)
    }

    private collectionPath(name: CollectionName): string {
        return path.join(this.baseDir, `${name}.json`)
    }
}
