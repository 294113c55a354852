import type { AgentRole, DispatchableRole } from './types.js'

export type DispatchState = 'requested' | 'scoped' | 'invoked' | 'delegated' | 'completed' | 'failed'

export type EventMap = {
    'dispatch:transition': { taskId: string; nodeId: string; role: DispatchableRole; depth: number; from: DispatchState | null; to: DispatchState }
    'dispatch:declined': { taskId: string; parentId: string | null; role: DispatchableRole; requestedDepth: number }
    'agent:start': { role: DispatchableRole; taskId: string; agentId: string }
    'agent:complete': { role: DispatchableRole; taskId: string; agentId: string; duration: number }
    'agent:error': { role: DispatchableRole; taskId: string; agentId: string; error: Error }
    'tool:before': { toolName: string; role: DispatchableRole; args: unknown }
    'tool:after': { toolName: string; role: DispatchableRole; duration: number; success: boolean }
    'token:usage': { role: DispatchableRole; prompt: number; completion: number }
    'memory:buffer-append': { entryId: string; taskId: string; key: string; role: AgentRole }
    'memory:canon-write': { key: string; version: number; agentId: string }
    'memory:dispute': { disputeId: string; canonKey: string; taskId: string }
    'session:open': { taskId: string }
    'session:close': { taskId: string; promoted: number; dismissed: number; disputed: number; failed: number }
}

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const existing: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        const set = existing ?? new Set<EventHandler<EventMap[K]>>()
        set.add(handler)
        if (!existing) this.handlers[event] = set
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        set?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }
}
