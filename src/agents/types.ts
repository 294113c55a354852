import type { DispatchOutcome, DispatchRequest } from '../dispatch/types.js'

export interface AgentRunResult {
    status: 'completed' | 'failed'
    output: string
    error?: Error
    turns: number
    tokenUsage: { prompt: number; completion: number }
    /** Dispatch calls refused before reaching the router (bad arguments, tool not allowed for the role). */
    rejectedDispatches: number
}

/** Runs child dispatches concurrently and resolves once every one is terminal. */
export type DelegateFn = (requests: DispatchRequest[]) => Promise<DispatchOutcome[]>
