import type { DispatchState, TypedEventEmitter } from '../core/events.js'
import type { DispatchableRole } from '../core/types.js'
import type { AgentHandle } from './types.js'

export interface DispatchNode {
    id: string
    role: DispatchableRole
    depth: number
    parentId: string | null
    task: string
    state: DispatchState
    history: DispatchState[]
    startedAt: number
    endedAt?: number
    error?: string
}

export interface DeclinedDispatch {
    parentId: string | null
    role: DispatchableRole
    requestedDepth: number
    task: string
    at: number
}

const TRANSITIONS: Readonly<Record<DispatchState, readonly DispatchState[]>> = {
    requested: ['scoped', 'failed'],
    scoped: ['invoked', 'failed'],
    invoked: ['completed', 'delegated', 'failed'],
    delegated: ['invoked', 'failed'],
    completed: [],
    failed: [],
}

export function isTerminal(state: DispatchState): boolean {
    return TRANSITIONS[state].length === 0
}

/** Every dispatch of one task session, with the attempts refused at the depth bound. */
export class DispatchTree {
    private nodes = new Map<string, DispatchNode>()
    private declinedList: DeclinedDispatch[] = []

    constructor(
        readonly taskId: string,
        private eventBus?: TypedEventEmitter
    ) {}

    add(handle: AgentHandle, task: string): DispatchNode {
        const node: DispatchNode = {
            id: handle.id,
            role: handle.role,
            depth: handle.depth,
            parentId: handle.parent?.deref()?.id ?? null,
            task,
            state: 'requested',
            history: ['requested'],
            startedAt: Date.now(),
        }
        this.nodes.set(node.id, node)
        this.eventBus?.emit('dispatch:transition', {
            taskId: this.taskId,
            nodeId: node.id,
            role: node.role,
            depth: node.depth,
            from: null,
            to: 'requested',
        })
        return node
    }

    /** Moves a node along the state machine; returns false for an illegal move. */
    transition(nodeId: string, to: DispatchState, error?: string): boolean {
        const node = this.nodes.get(nodeId)
        if (!node || !TRANSITIONS[node.state].includes(to)) return false

        const from = node.state
        node.state = to
        node.history.push(to)
        if (isTerminal(to)) node.endedAt = Date.now()
        if (error) node.error = error

        this.eventBus?.emit('dispatch:transition', { taskId: this.taskId, nodeId, role: node.role, depth: node.depth, from, to })
        return true
    }

    decline(entry: Omit<DeclinedDispatch, 'at'>): void {
        this.declinedList.push({ ...entry, at: Date.now() })
        this.eventBus?.emit('dispatch:declined', {
            taskId: this.taskId,
            parentId: entry.parentId,
            role: entry.role,
            requestedDepth: entry.requestedDepth,
        })
    }

    get(nodeId: string): DispatchNode | undefined {
        const node = this.nodes.get(nodeId)
        return node ? { ...node, history: [...node.history] } : undefined
    }

    list(): DispatchNode[] {
        return [...this.nodes.values()].map((node) => ({ ...node, history: [...node.history] }))
    }

    children(nodeId: string): DispatchNode[] {
        return this.list().filter((node) => node.parentId === nodeId)
    }

    get declined(): readonly DeclinedDispatch[] {
        return [...this.declinedList]
    }

    maxDepth(): number {
        let max = -1
        for (const node of this.nodes.values()) max = Math.max(max, node.depth)
        return max
    }

    inFlight(): number {
        let count = 0
        for (const node of this.nodes.values()) if (!isTerminal(node.state)) count++
        return count
    }
}
