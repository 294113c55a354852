import { randomUUID } from 'node:crypto'
import { InvalidTransitionError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { KeyedMutex } from '../core/mutex.js'
import type { Caller } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { assertPermitted } from '../permissions/arbiter.js'
import type { DurableStorage } from '../storage/types.js'
import { type DisputeLogRecord, DisputeLogRecordSchema } from './schemas.js'
import type { DisputeFilter, DisputeRecord, DisputeResolution } from './types.js'

export type DisputeOpen = Omit<DisputeRecord, 'id' | 'status' | 'resolution' | 'createdAt'>

export interface DisputeLayerDeps {
    storage: DurableStorage
    logger: Logger
    eventBus?: TypedEventEmitter
}

export class DisputeLayer {
    private records = new Map<string, DisputeRecord>()
    private locks = new KeyedMutex()

    constructor(private deps: DisputeLayerDeps) {}

    async load(): Promise<void> {
        const lines = await this.deps.storage.readLog('disputes')
        this.records.clear()

        for (const raw of lines) {
            const parsed = DisputeLogRecordSchema.safeParse(raw)
            if (!parsed.success) {
                this.deps.logger.warn('disputes:skip-invalid')
                continue
            }
            this.replay(parsed.data)
        }
    }

    async open(input: DisputeOpen, caller: Caller): Promise<DisputeRecord> {
        assertPermitted({ verb: 'append', layer: 'dispute', role: caller.role })

        const record: DisputeRecord = {
            ...structuredClone(input),
            id: randomUUID(),
            status: 'open',
            createdAt: new Date().toISOString(),
        }
        await this.deps.storage.append('disputes', { type: 'opened', dispute: record } satisfies DisputeLogRecord)
        this.records.set(record.id, record)

        this.deps.logger.info({ id: record.id, key: record.canonKey, taskId: record.taskId }, 'dispute:open')
        this.deps.eventBus?.emit('memory:dispute', { disputeId: record.id, canonKey: record.canonKey, taskId: record.taskId })
        return structuredClone(record)
    }

    /**
     * Closes an open dispute. `apply` runs under the dispute's lock before the
     * resolution is recorded. If recording fails the dispute stays open and a
     * retry runs `apply` again, so it must be idempotent.
     */
    async resolve(
        id: string,
        resolution: Omit<DisputeResolution, 'resolvedAt' | 'canonVersion'>,
        caller: Caller,
        apply?: (record: DisputeRecord) => Promise<number | undefined>
    ): Promise<DisputeRecord> {
        assertPermitted({ verb: 'write', layer: 'dispute', role: caller.role })

        return this.locks.runExclusive(id, async () => {
            const record = this.records.get(id)
            if (!record) throw new InvalidTransitionError(`Unknown dispute '${id}'`)
            if (record.status !== 'open') throw new InvalidTransitionError(`Dispute '${id}' is already resolved`)

            const canonVersion = apply ? await apply(structuredClone(record)) : undefined
            const full: DisputeResolution = {
                ...resolution,
                resolvedAt: new Date().toISOString(),
                ...(canonVersion !== undefined ? { canonVersion } : {}),
            }
            await this.deps.storage.append('disputes', { type: 'resolved', id, resolution: full } satisfies DisputeLogRecord)

            const resolved: DisputeRecord = { ...record, status: 'resolved', resolution: full }
            this.records.set(id, resolved)
            this.deps.logger.info({ id, outcome: full.outcome }, 'dispute:resolve')
            return structuredClone(resolved)
        })
    }

    list(filter: DisputeFilter, caller: Caller): DisputeRecord[] {
        assertPermitted({ verb: 'read', layer: 'dispute', role: caller.role })
        return [...this.records.values()]
            .filter((record) => filter.status === undefined || record.status === filter.status)
            .filter((record) => filter.taskId === undefined || record.taskId === filter.taskId)
            .map((record) => structuredClone(record))
    }

    get(id: string): DisputeRecord | undefined {
        const record = this.records.get(id)
        return record ? structuredClone(record) : undefined
    }

    /** Open dispute already covering a buffer entry, if any. */
    findOpenFor(bufferEntryId: string): DisputeRecord | undefined {
        for (const record of this.records.values()) {
            if (record.status === 'open' && record.bufferEntryIds.includes(bufferEntryId)) return structuredClone(record)
        }
        return undefined
    }

    get openCount(): number {
        let count = 0
        for (const record of this.records.values()) if (record.status === 'open') count++
        return count
    }

    private replay(record: DisputeLogRecord): void {
        if (record.type === 'opened') {
            const { dispute } = record
            this.records.set(dispute.id, {
                ...dispute,
                incomingClaim: dispute.incomingClaim,
                existingValue: dispute.existingValue,
            })
            return
        }
        const existing = this.records.get(record.id)
        if (!existing || existing.status !== 'open') {
            this.deps.logger.warn({ id: record.id }, 'disputes:skip-orphan-resolution')
            return
        }
        this.records.set(record.id, { ...existing, status: 'resolved', resolution: record.resolution })
    }
}
