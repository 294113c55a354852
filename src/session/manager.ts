import { randomUUID } from 'node:crypto'
import { errorMessage, SessionClosedError, UnknownTaskError } from '../core/errors.js'
import type { DispatchOutcome } from '../dispatch/types.js'
import { TaskSession, type TaskSessionDeps } from './task-session.js'
import type { RunInput, SessionCloseReport, TaskRunReport } from './types.js'

export class SessionManager {
    private sessions = new Map<string, TaskSession>()

    constructor(private deps: TaskSessionDeps) {}

    async open(prompt: string, taskId: string = randomUUID()): Promise<TaskSession> {
        const existing = this.sessions.get(taskId)
        if (existing) {
            if (existing.status !== 'open') throw new SessionClosedError(taskId)
            return existing
        }
        if (this.deps.memory.tasks.status(taskId) === 'archived') throw new SessionClosedError(taskId)

        await this.deps.memory.openTaskMemory(taskId, prompt)
        const session = new TaskSession(taskId, prompt, this.deps)
        this.sessions.set(taskId, session)
        this.deps.tracer.startTrace(taskId)
        this.deps.eventBus.emit('session:open', { taskId })
        this.deps.logger.debug({ taskId }, 'session:open')
        return session
    }

    get(taskId: string): TaskSession {
        const session = this.sessions.get(taskId)
        if (session) return session
        if (this.deps.memory.tasks.status(taskId) === 'archived') throw new SessionClosedError(taskId)
        throw new UnknownTaskError(taskId)
    }

    async run(taskId: string, input?: RunInput): Promise<DispatchOutcome> {
        return this.get(taskId).run(input)
    }

    async close(taskId: string): Promise<SessionCloseReport> {
        return this.get(taskId).close()
    }

    /** open → run → close for a single prompt. */
    async runTask(prompt: string, input: Omit<RunInput, 'task'> = {}): Promise<TaskRunReport> {
        const session = await this.open(prompt)
        let outcome: DispatchOutcome
        try {
            outcome = await session.run(input)
        } catch (error) {
            await session.close().catch((closeError: unknown) => {
                this.deps.logger.warn({ taskId: session.taskId, error: errorMessage(closeError) }, 'session:close-after-failure-failed')
            })
            throw error
        }
        const report = await session.close()
        return { ...report, outcome }
    }

    list(): TaskSession[] {
        return [...this.sessions.values()]
    }

    async closeAll(): Promise<void> {
        await Promise.all(this.list().filter((s) => s.status === 'open').map((s) => s.close()))
    }
}
