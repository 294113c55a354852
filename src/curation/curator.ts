import type { CurationConfig } from '../config/schema.js'
import { errorMessage, InvalidTransitionError, VersionConflictError } from '../core/errors.js'
import type { Caller } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { MemoryStore } from '../memory/store.js'
import type { CanonEntry, DisputeOutcome, DisputeRecord, TentativeBufferEntry } from '../memory/types.js'
import { assertPermitted } from '../permissions/arbiter.js'
import { type ClaimComparator, defaultClaimComparator } from './agreement.js'

export interface ScoredEntry {
    entry: TentativeBufferEntry
    score: number
}

export interface Cluster {
    key: string
    members: ScoredEntry[]
}

export interface CurationReport {
    taskId: string
    promoted: string[]
    dismissed: string[]
    disputed: string[]
    failed: { entryId: string; error: string }[]
    canonWrites: { key: string; version: number }[]
    disputes: string[]
}

export type PromotionOutcome =
    | { status: 'promoted'; entry: CanonEntry | undefined; entryIds: string[] }
    | { status: 'disputed'; dispute: DisputeRecord; entryIds: string[] }

export interface PromoteClaimInput {
    taskId: string
    key: string
    claim: unknown
    confidence: number
    source?: string
}

export interface CuratorDeps {
    memory: MemoryStore
    config: CurationConfig
    logger: Logger
    comparator?: ClaimComparator
}

const MAX_PROMOTION_ATTEMPTS = 3

function emptyReport(taskId: string): CurationReport {
    return { taskId, promoted: [], dismissed: [], disputed: [], failed: [], canonWrites: [], disputes: [] }
}

function byConfidence(a: TentativeBufferEntry, b: TentativeBufferEntry): number {
    return b.confidence - a.confidence || a.timestamp.localeCompare(b.timestamp)
}

/**
 * Reconciles a task's pending buffer entries against Canon. Agreeing claims
 * are promoted as a new Canon version, conflicting ones become disputes; Canon
 * is never overwritten outside the key's exclusive section.
 */
export class Curator {
    private comparator: ClaimComparator

    constructor(private deps: CuratorDeps) {
        this.comparator = deps.comparator ?? defaultClaimComparator
    }

    private callerFor(taskId: string): Caller {
        return { agentId: 'curator', role: 'curator', taskId }
    }

    agrees(a: unknown, b: unknown): boolean {
        return this.comparator.distance(a, b) <= this.deps.config.agreementTolerance
    }

    /** Groups entries by key, then by agreeing claim, and scores each entry by corroboration. */
    cluster(entries: readonly TentativeBufferEntry[]): Cluster[] {
        const clusters: { key: string; members: TentativeBufferEntry[] }[] = []
        for (const entry of [...entries].sort(byConfidence)) {
            const match = clusters.find((c) => c.key === entry.key && c.members[0] && this.agrees(c.members[0].claim, entry.claim))
            if (match) match.members.push(entry)
            else clusters.push({ key: entry.key, members: [entry] })
        }

        const { corroborationBonus } = this.deps.config
        return clusters.map((c) => {
            const agents = new Set(c.members.map((m) => m.agentId)).size
            const bonus = corroborationBonus * (agents - 1)
            return {
                key: c.key,
                members: c.members.map((entry) => ({ entry, score: Math.min(1, entry.confidence + bonus) })),
            }
        })
    }

    async curateTask(taskId: string): Promise<CurationReport> {
        const { memory, logger, config } = this.deps
        const caller = this.callerFor(taskId)
        const report = emptyReport(taskId)

        const pending = memory.readBuffer({ taskId, status: 'pending' }, caller)
        if (pending.length === 0) {
            logger.debug({ taskId }, 'curation:nothing-pending')
            return report
        }

        const candidates: Cluster[] = []
        for (const cluster of this.cluster(pending)) {
            const surviving: ScoredEntry[] = []
            for (const member of cluster.members) {
                if (member.score >= config.confidenceFloor) {
                    surviving.push(member)
                    continue
                }
                await this.settle(report, [member.entry.id], 'dismissed', caller)
            }
            if (surviving.length > 0) candidates.push({ key: cluster.key, members: surviving })
        }

        candidates.sort((a, b) => (b.members[0]?.score ?? 0) - (a.members[0]?.score ?? 0))
        for (const cluster of candidates) {
            const ids = cluster.members.map((m) => m.entry.id)
            try {
                const outcome = await this.promoteCluster(cluster, taskId, caller)
                if (outcome.status === 'promoted') {
                    if (outcome.entry) report.canonWrites.push({ key: outcome.entry.key, version: outcome.entry.version })
                    await this.settle(report, ids, 'promoted', caller)
                } else {
                    if (!report.disputes.includes(outcome.dispute.id)) report.disputes.push(outcome.dispute.id)
                    await this.settle(report, ids, 'disputed', caller)
                }
            } catch (error) {
                logger.warn({ taskId, key: cluster.key, error: errorMessage(error) }, 'curation:promotion-failed')
                for (const id of ids) report.failed.push({ entryId: id, error: errorMessage(error) })
            }
        }

        logger.info(
            {
                taskId,
                promoted: report.promoted.length,
                dismissed: report.dismissed.length,
                disputed: report.disputed.length,
                failed: report.failed.length,
            },
            'curation:complete'
        )
        return report
    }

    /**
     * The orchestrator's direct path into Canon: the claim is recorded in the
     * buffer and promoted without the confidence floor, or disputed on conflict.
     */
    async promoteClaim(input: PromoteClaimInput, requestedBy: Caller): Promise<PromotionOutcome> {
        assertPermitted({ verb: 'write', layer: 'canon', role: requestedBy.role })

        const caller = this.callerFor(input.taskId)
        const entry = await this.deps.memory.appendBuffer(
            { taskId: input.taskId, key: input.key, claim: input.claim, confidence: input.confidence, source: input.source },
            requestedBy
        )
        const cluster: Cluster = { key: entry.key, members: [{ entry, score: entry.confidence }] }
        const outcome = await this.promoteCluster(cluster, input.taskId, caller)

        const report = emptyReport(input.taskId)
        await this.settle(report, [entry.id], outcome.status, caller)
        if (report.failed.length > 0) {
            this.deps.logger.warn({ entryId: entry.id, failed: report.failed }, 'curation:settle-failed')
        }
        return outcome
    }

    async resolveDispute(id: string, outcome: DisputeOutcome, resolver: Caller, note?: string): Promise<DisputeRecord> {
        const { memory } = this.deps
        const resolution = { outcome, resolvedBy: resolver.agentId, ...(note ? { note } : {}) }

        if (outcome === 'keep_canon') {
            return memory.resolveDisputeRecord(id, resolution, resolver)
        }

        return memory.resolveDisputeRecord(id, resolution, resolver, async (record) => {
            const { result, entry } = await memory.transactCanon<number | undefined>(record.canonKey, resolver, (current) => {
                // installed by an earlier attempt whose resolution was not recorded
                if (current && record.bufferEntryIds.every((entryId) => current.sourceEntryIds.includes(entryId))) {
                    return { result: current.version }
                }
                return {
                    result: undefined,
                    write: {
                        value: record.incomingClaim,
                        confidence: record.incomingConfidence,
                        sourceEntryIds: record.bufferEntryIds,
                    },
                }
            })
            return entry?.version ?? result
        })
    }

    private async promoteCluster(cluster: Cluster, taskId: string, caller: Caller): Promise<PromotionOutcome> {
        for (let attempt = 1; ; attempt++) {
            try {
                return await this.promoteOnce(cluster, taskId, caller)
            } catch (error) {
                if (!(error instanceof VersionConflictError) || attempt >= MAX_PROMOTION_ATTEMPTS) throw error
                this.deps.logger.debug({ key: cluster.key, attempt }, 'curation:retry-version-conflict')
            }
        }
    }

    private async promoteOnce(cluster: Cluster, taskId: string, caller: Caller): Promise<PromotionOutcome> {
        const { memory } = this.deps
        const [best] = cluster.members
        if (!best) throw new InvalidTransitionError(`Empty cluster for '${cluster.key}'`)
        const ids = cluster.members.map((m) => m.entry.id)

        const { result, entry } = await memory.transactCanon<PromotionOutcome>(cluster.key, caller, async (current) => {
            if (current?.sourceEntryIds.some((id) => ids.includes(id))) {
                return { result: { status: 'promoted', entry: undefined, entryIds: ids } }
            }

            if (!current || this.agrees(current.value, best.entry.claim)) {
                return {
                    result: { status: 'promoted', entry: undefined, entryIds: ids },
                    write: { value: best.entry.claim, confidence: best.score, sourceEntryIds: ids },
                }
            }

            const dispute = ids.map((id) => memory.disputes.findOpenFor(id)).find((d) => d !== undefined)
            return {
                result: {
                    status: 'disputed',
                    entryIds: ids,
                    dispute:
                        dispute ??
                        (await memory.openDispute(
                            {
                                taskId,
                                canonKey: cluster.key,
                                incomingClaim: best.entry.claim,
                                incomingConfidence: best.score,
                                bufferEntryIds: ids,
                                existingCanonVersion: current.version,
                                existingValue: current.value,
                                reason: `Claim from ${best.entry.role} conflicts with Canon v${current.version}`,
                            },
                            caller
                        )),
                },
            }
        })

        return result.status === 'promoted' ? { ...result, entry } : result
    }

    private async settle(
        report: CurationReport,
        ids: string[],
        status: 'promoted' | 'dismissed' | 'disputed',
        caller: Caller
    ): Promise<void> {
        for (const id of ids) {
            try {
                await this.deps.memory.transitionBuffer(id, status, caller)
                report[status].push(id)
            } catch (error) {
                if (error instanceof InvalidTransitionError) {
                    this.deps.logger.debug({ id, status }, 'curation:already-settled')
                    continue
                }
                report.failed.push({ entryId: id, error: errorMessage(error) })
            }
        }
    }
}
