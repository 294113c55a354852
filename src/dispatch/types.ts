import type { StrataErrorCode } from '../core/errors.js'
import type { CanonScope, DispatchableRole } from '../core/types.js'

/** Identity of one invoked agent. The parent reference is for lookup only. */
export interface AgentHandle {
    readonly id: string
    readonly role: DispatchableRole
    readonly depth: number
    readonly taskId: string
    readonly parent?: WeakRef<AgentHandle>
}

export interface DispatchRequest {
    task: string
    /** Omitted: the orchestrator classifies the task itself. */
    role?: DispatchableRole
    context?: string
    canonScope?: CanonScope
    /** Tool call that issued the request. */
    via?: string
}

export type DispatchOutcomeStatus = 'completed' | 'failed' | 'declined'

export interface DispatchOutcome {
    nodeId: string | null
    role: DispatchableRole
    depth: number
    status: DispatchOutcomeStatus
    output: string
    error?: { code: StrataErrorCode | 'UNKNOWN'; message: string }
    /** True when any child of this dispatch failed or was declined. */
    partialFailure: boolean
    tokenUsage: { prompt: number; completion: number }
}
