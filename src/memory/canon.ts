import { errorMessage, VersionConflictError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { KeyedMutex } from '../core/mutex.js'
import type { Caller, CanonScope } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { assertPermitted } from '../permissions/arbiter.js'
import type { DurableStorage } from '../storage/types.js'
import { storedVersion } from '../storage/versioned.js'
import { CanonEntrySchema } from './schemas.js'
import type { CanonEntry, CanonWrite } from './types.js'

export interface CanonProposal {
    value: unknown
    confidence: number
    sourceEntryIds?: string[]
}

export interface CanonDecision<T> {
    result: T
    write?: CanonProposal
}

export interface CanonLayerDeps {
    storage: DurableStorage
    logger: Logger
    eventBus?: TypedEventEmitter
}

export function parseCanonEntry(raw: unknown): CanonEntry | null {
    const parsed = CanonEntrySchema.safeParse(raw)
    if (!parsed.success) return null
    return { ...parsed.data, value: parsed.data.value }
}

export function inCanonScope(key: string, scope: CanonScope): boolean {
    if (scope === '*') return true
    return scope.some((prefix) => key.startsWith(prefix))
}

function scopeOf(caller: Caller): CanonScope {
    if (caller.canonScope) return caller.canonScope
    return caller.role === 'orchestrator' || caller.role === 'curator' ? '*' : []
}

/**
 * Versioned key-value store. Every write runs inside the key's exclusive
 * section and is installed through compare-and-swap, so exactly one writer
 * wins each version.
 */
export class CanonLayer {
    private entries = new Map<string, CanonEntry>()
    // installed versions whose history record is not yet in the log
    private unrecorded = new Map<string, CanonEntry>()
    private locks = new KeyedMutex()

    constructor(private deps: CanonLayerDeps) {}

    async load(): Promise<void> {
        const raw = await this.deps.storage.readCollection('canon')
        this.entries.clear()
        for (const [key, value] of Object.entries(raw)) {
            const entry = parseCanonEntry(value)
            if (!entry || entry.key !== key) {
                this.deps.logger.warn({ key }, 'canon:skip-invalid')
                continue
            }
            this.entries.set(key, entry)
        }

        const recorded = new Set<string>()
        for (const record of await this.deps.storage.readLog('canon-history')) {
            const entry = parseCanonEntry(record)
            if (entry) recorded.add(`${entry.key}@${entry.version}`)
        }
        this.unrecorded.clear()
        for (const entry of this.entries.values()) {
            if (!recorded.has(`${entry.key}@${entry.version}`)) this.unrecorded.set(entry.key, entry)
        }
        for (const key of [...this.unrecorded.keys()]) {
            try {
                await this.backfill(key)
            } catch (error) {
                this.deps.logger.warn({ key, error: errorMessage(error) }, 'canon:history-backfill-failed')
            }
        }
    }

    get size(): number {
        return this.entries.size
    }

    readSlice(keys: Iterable<string> | undefined, caller: Caller): Record<string, CanonEntry> {
        assertPermitted({ verb: 'read', layer: 'canon', role: caller.role })
        const scope = scopeOf(caller)
        const wanted = keys ? [...keys] : [...this.entries.keys()].sort()

        const slice: Record<string, CanonEntry> = {}
        for (const key of wanted) {
            if (!inCanonScope(key, scope)) continue
            const entry = this.entries.get(key)
            if (entry) slice[key] = structuredClone(entry)
        }
        return slice
    }

    async write(input: CanonWrite, caller: Caller): Promise<CanonEntry> {
        const { entry } = await this.transact(input.key, caller, (current) => {
            const actual = current?.version ?? 0
            if (actual !== input.expectedVersion) {
                throw new VersionConflictError(input.key, input.expectedVersion, actual)
            }
            return {
                result: undefined,
                write: { value: input.value, confidence: input.confidence, sourceEntryIds: input.sourceEntryIds },
            }
        })
        if (!entry) throw new VersionConflictError(input.key, input.expectedVersion, this.entries.get(input.key)?.version ?? 0)
        return entry
    }

    /**
     * Runs `decide` against the current entry while holding the key's lock and
     * installs its proposal, if any, as the next version.
     */
    async transact<T>(
        key: string,
        caller: Caller,
        decide: (current: CanonEntry | undefined) => CanonDecision<T> | Promise<CanonDecision<T>>
    ): Promise<{ result: T; entry?: CanonEntry }> {
        assertPermitted({ verb: 'write', layer: 'canon', role: caller.role })

        return this.locks.runExclusive(key, async () => {
            await this.backfill(key)
            const current = this.entries.get(key)
            const decision = await decide(current ? structuredClone(current) : undefined)
            if (!decision.write) return { result: decision.result }

            const entry = await this.install(key, current?.version ?? 0, decision.write, caller)
            return { result: decision.result, entry: structuredClone(entry) }
        })
    }

    async history(key: string): Promise<CanonEntry[]> {
        await this.locks.runExclusive(key, () => this.backfill(key))
        const records = await this.deps.storage.readLog('canon-history')
        const versions: CanonEntry[] = []
        for (const record of records) {
            const entry = parseCanonEntry(record)
            if (entry?.key === key) versions.push(entry)
        }
        return versions.sort((a, b) => a.version - b.version)
    }

    /** Writes the history record a previous install could not. Throws StorageFailureError if it still cannot. */
    private async backfill(key: string): Promise<void> {
        const entry = this.unrecorded.get(key)
        if (!entry) return
        await this.deps.storage.append('canon-history', entry)
        this.unrecorded.delete(key)
        this.deps.logger.info({ key, version: entry.version }, 'canon:history-backfilled')
    }

    private async install(key: string, expectedVersion: number, proposal: CanonProposal, caller: Caller): Promise<CanonEntry> {
        const next: CanonEntry = {
            key,
            value: proposal.value,
            confidence: proposal.confidence,
            lastUpdatedBy: caller.agentId,
            version: expectedVersion + 1,
            updatedAt: new Date().toISOString(),
            sourceEntryIds: proposal.sourceEntryIds ?? [],
        }

        const swapped = await this.deps.storage.compareAndSwap('canon', key, expectedVersion, next)
        if (!swapped) {
            const stored = await this.deps.storage.readCollection('canon')
            const actual = storedVersion(stored[key])
            const fresh = parseCanonEntry(stored[key])
            if (fresh) this.entries.set(key, fresh)
            throw new VersionConflictError(key, expectedVersion, actual)
        }

        this.entries.set(key, next)
        try {
            await this.deps.storage.append('canon-history', next)
        } catch (error) {
            this.unrecorded.set(key, next)
            this.deps.logger.warn({ key, version: next.version, error: errorMessage(error) }, 'canon:history-append-failed')
        }

        this.deps.logger.info({ key, version: next.version, by: caller.agentId }, 'canon:write')
        this.deps.eventBus?.emit('memory:canon-write', { key, version: next.version, agentId: caller.agentId })
        return next
    }
}
