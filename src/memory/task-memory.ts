import { SessionClosedError, UnknownTaskError } from '../core/errors.js'
import { KeyedMutex } from '../core/mutex.js'
import type { Caller } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { assertPermitted } from '../permissions/arbiter.js'
import type { DurableStorage } from '../storage/types.js'
import { type TaskMemoryRecord, TaskMemoryRecordSchema } from './schemas.js'
import type { TaskMemory, TaskMemoryEntry } from './types.js'

export interface TaskMemoryLayerDeps {
    storage: DurableStorage
    logger: Logger
}

export interface TaskMemoryAppend {
    content: string
    label?: string
}

function freezeTask(task: TaskMemory): Readonly<TaskMemory> {
    for (const entry of task.entries) Object.freeze(entry)
    Object.freeze(task.entries)
    return Object.freeze(task)
}

/**
 * Shared narrative of one task. Appends are serialized per task; once the
 * task is archived its memory is frozen and every read returns the same
 * snapshot.
 */
export class TaskMemoryLayer {
    private tasks = new Map<string, TaskMemory>()
    private archived = new Map<string, Readonly<TaskMemory>>()
    private locks = new KeyedMutex()

    constructor(private deps: TaskMemoryLayerDeps) {}

    async load(): Promise<void> {
        const records = await this.deps.storage.readLog('task-memory')
        this.tasks.clear()
        this.archived.clear()

        for (const raw of records) {
            const parsed = TaskMemoryRecordSchema.safeParse(raw)
            if (!parsed.success) {
                this.deps.logger.warn('task-memory:skip-invalid')
                continue
            }
            this.replay(parsed.data)
        }
    }

    async open(taskId: string, prompt: string): Promise<TaskMemory> {
        return this.locks.runExclusive(taskId, async () => {
            if (this.archived.has(taskId)) throw new SessionClosedError(taskId)
            const existing = this.tasks.get(taskId)
            if (existing) return structuredClone(existing)

            const openedAt = new Date().toISOString()
            await this.deps.storage.append('task-memory', {
                type: 'opened',
                taskId,
                prompt,
                at: openedAt,
            } satisfies TaskMemoryRecord)

            const task: TaskMemory = { taskId, prompt, status: 'open', openedAt, entries: [] }
            this.tasks.set(taskId, task)
            return structuredClone(task)
        })
    }

    async append(taskId: string, input: TaskMemoryAppend, caller: Caller): Promise<TaskMemoryEntry> {
        assertPermitted({ verb: 'append', layer: 'task', role: caller.role, callerTaskId: caller.taskId, taskId })

        return this.locks.runExclusive(taskId, async () => {
            if (this.archived.has(taskId)) throw new SessionClosedError(taskId)
            const task = this.tasks.get(taskId)
            if (!task) throw new UnknownTaskError(taskId)

            const entry: TaskMemoryEntry = {
                agentId: caller.agentId,
                role: caller.role,
                ...(input.label ? { label: input.label } : {}),
                content: input.content,
                timestamp: new Date().toISOString(),
            }
            await this.deps.storage.append('task-memory', { type: 'entry', taskId, entry } satisfies TaskMemoryRecord)
            task.entries.push(entry)
            return { ...entry }
        })
    }

    read(taskId: string, caller: Caller): Readonly<TaskMemory> {
        assertPermitted({ verb: 'read', layer: 'task', role: caller.role, callerTaskId: caller.taskId, taskId })

        const frozen = this.archived.get(taskId)
        if (frozen) return frozen
        const task = this.tasks.get(taskId)
        if (!task) throw new UnknownTaskError(taskId)
        return structuredClone(task)
    }

    async archive(taskId: string): Promise<Readonly<TaskMemory>> {
        return this.locks.runExclusive(taskId, async () => {
            const frozen = this.archived.get(taskId)
            if (frozen) return frozen
            const task = this.tasks.get(taskId)
            if (!task) throw new UnknownTaskError(taskId)

            await this.deps.storage.append('task-memory', {
                type: 'archived',
                taskId,
                at: new Date().toISOString(),
            } satisfies TaskMemoryRecord)
            return this.freeze(task)
        })
    }

    status(taskId: string): TaskMemory['status'] | undefined {
        if (this.archived.has(taskId)) return 'archived'
        return this.tasks.has(taskId) ? 'open' : undefined
    }

    counts(): { open: number; archived: number } {
        return { open: this.tasks.size, archived: this.archived.size }
    }

    private freeze(task: TaskMemory): Readonly<TaskMemory> {
        this.tasks.delete(task.taskId)
        const snapshot = freezeTask({ ...structuredClone(task), status: 'archived' })
        this.archived.set(task.taskId, snapshot)
        return snapshot
    }

    private replay(record: TaskMemoryRecord): void {
        switch (record.type) {
            case 'opened':
                if (!this.tasks.has(record.taskId) && !this.archived.has(record.taskId)) {
                    this.tasks.set(record.taskId, {
                        taskId: record.taskId,
                        prompt: record.prompt,
                        status: 'open',
                        openedAt: record.at,
                        entries: [],
                    })
                }
                return
            case 'entry': {
                const task = this.tasks.get(record.taskId)
                if (task) task.entries.push(record.entry)
                else this.deps.logger.warn({ taskId: record.taskId }, 'task-memory:orphan-entry')
                return
            }
            case 'archived': {
                const task = this.tasks.get(record.taskId)
                if (task) this.freeze(task)
                return
            }
        }
    }
}
