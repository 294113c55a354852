import { randomUUID } from 'node:crypto'
import type { DispatchableRole } from '../core/types.js'
import type { AgentHandle } from './types.js'

export function createHandle(role: DispatchableRole, taskId: string, parent?: AgentHandle): AgentHandle {
    return Object.freeze({
        id: `${role}-${randomUUID().slice(0, 8)}`,
        role,
        depth: parent ? parent.depth + 1 : 0,
        taskId,
        ...(parent ? { parent: new WeakRef(parent) } : {}),
    })
}

export function childDepth(parent?: AgentHandle): number {
    return parent ? parent.depth + 1 : 0
}

