import type { Caller } from '../core/types.js'
import { assertPermitted } from '../permissions/arbiter.js'
import type { ScratchNote } from './types.js'

function slot(agentId: string, taskId: string): string {
    return `${taskId}\u0000${agentId}`
}

/** Private per-agent notes. Process-local and dropped when the owner's dispatch ends. */
export class ScratchLayer {
    private notes = new Map<string, ScratchNote[]>()

    read(agentId: string, taskId: string, caller: Caller): ScratchNote[] {
        this.check('read', agentId, taskId, caller)
        return (this.notes.get(slot(agentId, taskId)) ?? []).map((note) => ({ ...note }))
    }

    write(agentId: string, taskId: string, content: string, caller: Caller): ScratchNote {
        this.check('write', agentId, taskId, caller)
        const note: ScratchNote = { agentId, taskId, content, timestamp: new Date().toISOString() }
        const key = slot(agentId, taskId)
        this.notes.set(key, [...(this.notes.get(key) ?? []), note])
        return { ...note }
    }

    clear(agentId: string, taskId: string): void {
        this.notes.delete(slot(agentId, taskId))
    }

    clearTask(taskId: string): void {
        for (const [key, notes] of this.notes) {
            if (notes[0]?.taskId === taskId) this.notes.delete(key)
        }
    }

    get size(): number {
        return this.notes.size
    }

    private check(verb: 'read' | 'write', agentId: string, taskId: string, caller: Caller): void {
        assertPermitted({
            verb,
            layer: 'scratch',
            role: caller.role,
            callerId: caller.agentId,
            ownerId: agentId,
            callerTaskId: caller.taskId,
            taskId,
        })
    }
}
