import { randomUUID } from 'node:crypto'
import { InvalidTransitionError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { KeyedMutex } from '../core/mutex.js'
import type { Caller } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { assertPermitted } from '../permissions/arbiter.js'
import type { DurableStorage } from '../storage/types.js'
import { type BufferRecord, BufferRecordSchema } from './schemas.js'
import type { BufferAppend, BufferEntry, BufferFilter, BufferStatus, TentativeBufferEntry } from './types.js'

export interface BufferLayerDeps {
    storage: DurableStorage
    logger: Logger
    eventBus?: TypedEventEmitter
}

function tentative(entry: BufferEntry): TentativeBufferEntry {
    return Object.freeze({ ...structuredClone(entry), tentative: true as const })
}

/**
 * Append-only log of unverified claims. Appends never wait on each other;
 * status moves once, out of `pending`, under the entry's lock.
 */
export class BufferLayer {
    private entries: BufferEntry[] = []
    private byId = new Map<string, number>()
    private locks = new KeyedMutex()

    constructor(private deps: BufferLayerDeps) {}

    async load(): Promise<void> {
        const records = await this.deps.storage.readLog('buffer')
        this.entries = []
        this.byId.clear()

        for (const raw of records) {
            const parsed = BufferRecordSchema.safeParse(raw)
            if (!parsed.success) {
                this.deps.logger.warn('buffer:skip-invalid')
                continue
            }
            this.replay(parsed.data)
        }
    }

    get size(): number {
        return this.entries.length
    }

    async append(input: BufferAppend, caller: Caller): Promise<TentativeBufferEntry> {
        assertPermitted({ verb: 'append', layer: 'buffer', role: caller.role })

        const entry: BufferEntry = {
            id: randomUUID(),
            taskId: input.taskId,
            agentId: caller.agentId,
            role: caller.role,
            key: input.key,
            claim: structuredClone(input.claim),
            source: input.source ?? '',
            confidence: Math.min(1, Math.max(0, input.confidence)),
            timestamp: new Date().toISOString(),
            status: 'pending',
        }

        await this.deps.storage.append('buffer', { type: 'entry', entry } satisfies BufferRecord)
        this.byId.set(entry.id, this.entries.length)
        this.entries.push(entry)

        this.deps.logger.debug({ id: entry.id, key: entry.key, agentId: entry.agentId }, 'buffer:append')
        this.deps.eventBus?.emit('memory:buffer-append', {
            entryId: entry.id,
            taskId: entry.taskId,
            key: entry.key,
            role: entry.role,
        })
        return tentative(entry)
    }

    read(filter: BufferFilter, caller: Caller): TentativeBufferEntry[] {
        assertPermitted({ verb: 'read', layer: 'buffer', role: caller.role })
        return this.entries
            .filter((entry) => filter.taskId === undefined || entry.taskId === filter.taskId)
            .filter((entry) => filter.status === undefined || entry.status === filter.status)
            .map(tentative)
    }

    get(id: string): TentativeBufferEntry | undefined {
        const index = this.byId.get(id)
        const entry = index === undefined ? undefined : this.entries[index]
        return entry ? tentative(entry) : undefined
    }

    async transition(id: string, status: Exclude<BufferStatus, 'pending'>, caller: Caller): Promise<TentativeBufferEntry> {
        assertPermitted({ verb: 'write', layer: 'buffer', role: caller.role })

        return this.locks.runExclusive(id, async () => {
            const index = this.byId.get(id)
            const entry = index === undefined ? undefined : this.entries[index]
            if (index === undefined || !entry) {
                throw new InvalidTransitionError(`Unknown buffer entry '${id}'`)
            }
            if (entry.status !== 'pending') {
                throw new InvalidTransitionError(`Buffer entry '${id}' is already ${entry.status}`)
            }

            await this.deps.storage.append('buffer', {
                type: 'status',
                id,
                status,
                at: new Date().toISOString(),
            } satisfies BufferRecord)

            const updated: BufferEntry = { ...entry, status }
            this.entries[index] = updated
            this.deps.logger.debug({ id, status }, 'buffer:transition')
            return tentative(updated)
        })
    }

    private replay(record: BufferRecord): void {
        if (record.type === 'entry') {
            if (this.byId.has(record.entry.id)) return
            this.byId.set(record.entry.id, this.entries.length)
            this.entries.push({ ...record.entry, claim: record.entry.claim })
            return
        }

        const index = this.byId.get(record.id)
        const entry = index === undefined ? undefined : this.entries[index]
        if (index === undefined || !entry || entry.status !== 'pending' || record.status === 'pending') {
            this.deps.logger.warn({ id: record.id, status: record.status }, 'buffer:skip-invalid-transition')
            return
        }
        this.entries[index] = { ...entry, status: record.status }
    }
}
