import { PermissionDeniedError } from '../core/errors.js'
import type { AgentRole, LayerVerb, MemoryLayer } from '../core/types.js'

type LayerGrants = Readonly<Record<MemoryLayer, readonly LayerVerb[]>>

const SPECIALIST_GRANTS: LayerGrants = {
    canon: ['read'],
    buffer: ['read', 'append'],
    scratch: ['read', 'write'],
    task: ['read', 'append'],
    dispute: ['read'],
}

/**
 * Role × layer × verb. For disputes `append` opens a record and `write`
 * resolves one; for the buffer `write` is a status transition.
 */
export const LAYER_PERMISSIONS: Readonly<Record<AgentRole, LayerGrants>> = {
    orchestrator: {
        canon: ['read', 'write'],
        buffer: ['read', 'append'],
        scratch: ['read', 'write'],
        task: ['read', 'append'],
        dispute: ['read', 'write'],
    },
    curator: {
        canon: ['read', 'write'],
        buffer: ['read', 'append', 'write'],
        scratch: [],
        task: ['read'],
        dispute: ['read', 'append', 'write'],
    },
    research: SPECIALIST_GRANTS,
    code: SPECIALIST_GRANTS,
    data: SPECIALIST_GRANTS,
    writing: SPECIALIST_GRANTS,
}

export interface AccessRequest {
    verb: LayerVerb
    layer: MemoryLayer
    role: AgentRole
    callerId?: string
    /** Owning agent of a scratch note. */
    ownerId?: string
    callerTaskId?: string
    /** Task the operation targets, for scratch and task memory. */
    taskId?: string
}

export interface AccessDecision {
    allowed: boolean
    reason?: string
}

export function permit(request: AccessRequest): AccessDecision {
    const { verb, layer, role } = request

    if (!LAYER_PERMISSIONS[role][layer].includes(verb)) {
        return { allowed: false, reason: `${role} may not ${verb} ${layer}` }
    }

    if (layer === 'scratch') {
        if (request.callerId === undefined || request.callerId !== request.ownerId) {
            return { allowed: false, reason: `scratch of ${request.ownerId ?? 'unknown agent'} is private` }
        }
        if (request.callerTaskId !== request.taskId) {
            return { allowed: false, reason: `scratch belongs to task ${request.taskId ?? 'unknown'}` }
        }
    }

    if (layer === 'task' && (request.callerTaskId === undefined || request.callerTaskId !== request.taskId)) {
        return { allowed: false, reason: `${role} is not a participant of task ${request.taskId ?? 'unknown'}` }
    }

    return { allowed: true }
}

export function assertPermitted(request: AccessRequest): void {
    const decision = permit(request)
    if (!decision.allowed) {
        throw new PermissionDeniedError(`Permission denied: ${decision.reason ?? `${request.verb} ${request.layer}`}`)
    }
}
