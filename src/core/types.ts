export type AgentRole = 'orchestrator' | 'research' | 'code' | 'data' | 'writing' | 'curator'

export type DispatchableRole = Exclude<AgentRole, 'curator'>

export const DISPATCHABLE_ROLES: readonly DispatchableRole[] = ['orchestrator', 'research', 'code', 'data', 'writing']

export const SPECIALIST_ROLES = ['research', 'code', 'data', 'writing'] as const

export type SpecialistRole = (typeof SPECIALIST_ROLES)[number]

export type MemoryLayer = 'canon' | 'buffer' | 'scratch' | 'task' | 'dispute'

export type LayerVerb = 'read' | 'append' | 'write'

// Canon visibility: '*' or a key-prefix allowlist
export type CanonScope = '*' | readonly string[]

export interface Caller {
    agentId: string
    role: AgentRole
    taskId?: string
    canonScope?: CanonScope
}

export const MAX_DISPATCH_DEPTH = 3

export const AGENT_TIMEOUTS: Record<DispatchableRole, { default: number; max: number }> = {
    orchestrator: { default: 120, max: 300 },
    research: { default: 45, max: 120 },
    code: { default: 120, max: 300 },
    data: { default: 60, max: 180 },
    writing: { default: 60, max: 120 },
}

export function isDispatchableRole(value: string): value is DispatchableRole {
    return DISPATCHABLE_ROLES.some((role) => role === value)
}
