import type { DispatchableRole } from '../core/types.js'
import type { CurationReport } from '../curation/curator.js'
import type { DeclinedDispatch, DispatchNode } from '../dispatch/tree.js'
import type { DispatchOutcome } from '../dispatch/types.js'
import type { TaskMemory } from '../memory/types.js'

export type SessionState = 'open' | 'closing' | 'closed'

export interface RunInput {
    /** Defaults to the session prompt. */
    task?: string
    /** Omitted: the orchestrator classifies the task. */
    role?: DispatchableRole
    context?: string
    signal?: AbortSignal
}

export interface SessionCloseReport {
    taskId: string
    curation: CurationReport
    taskMemory: Readonly<TaskMemory>
    dispatches: DispatchNode[]
    declined: readonly DeclinedDispatch[]
}

export interface TaskRunReport extends SessionCloseReport {
    outcome: DispatchOutcome
}
