import type { AgentRole } from '../core/types.js'

export interface CanonEntry {
    key: string
    value: unknown
    confidence: number
    lastUpdatedBy: string
    version: number
    updatedAt: string
    /** Buffer entries this version was promoted from. */
    sourceEntryIds: string[]
}

export interface CanonWrite {
    key: string
    value: unknown
    confidence: number
    /** Version the writer observed; 0 when the key was absent. */
    expectedVersion: number
    sourceEntryIds?: string[]
}

export type BufferStatus = 'pending' | 'promoted' | 'dismissed' | 'disputed'

export interface BufferEntry {
    id: string
    taskId: string
    agentId: string
    role: AgentRole
    key: string
    claim: unknown
    source: string
    confidence: number
    timestamp: string
    status: BufferStatus
}

export type TentativeBufferEntry = Readonly<BufferEntry> & { readonly tentative: true }

export interface BufferAppend {
    taskId: string
    key: string
    claim: unknown
    source?: string
    confidence: number
}

export interface BufferFilter {
    taskId?: string
    status?: BufferStatus
}

export interface ScratchNote {
    agentId: string
    taskId: string
    content: string
    timestamp: string
}

export interface TaskMemoryEntry {
    agentId: string
    role: AgentRole
    label?: string
    content: string
    timestamp: string
}

export type TaskMemoryStatus = 'open' | 'archived'

export interface TaskMemory {
    taskId: string
    prompt: string
    status: TaskMemoryStatus
    openedAt: string
    entries: TaskMemoryEntry[]
}

export type DisputeOutcome = 'keep_canon' | 'accept_claim'

export interface DisputeResolution {
    outcome: DisputeOutcome
    resolvedBy: string
    note?: string
    resolvedAt: string
    /** Canon version installed when the claim was accepted. */
    canonVersion?: number
}

export interface DisputeRecord {
    id: string
    taskId: string
    canonKey: string
    incomingClaim: unknown
    incomingConfidence: number
    bufferEntryIds: string[]
    existingCanonVersion: number
    existingValue: unknown
    reason: string
    status: 'open' | 'resolved'
    resolution?: DisputeResolution
    createdAt: string
}

export interface DisputeFilter {
    status?: DisputeRecord['status']
    taskId?: string
}

export interface MemorySummary {
    canonEntries: number
    bufferTotal: number
    bufferPending: number
    openTasks: number
    archivedTasks: number
    openDisputes: number
}
