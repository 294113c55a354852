import { SessionClosedError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { CurationReport, Curator } from '../curation/curator.js'
import type { DispatchRouter } from '../dispatch/router.js'
import { DispatchTree } from '../dispatch/tree.js'
import type { DispatchOutcome } from '../dispatch/types.js'
import type { Logger } from '../logger/index.js'
import type { MemoryStore } from '../memory/store.js'
import type { Tracer } from '../tracing/tracer.js'
import type { RunInput, SessionCloseReport, SessionState } from './types.js'

export interface TaskSessionDeps {
    router: DispatchRouter
    memory: MemoryStore
    curator: Curator
    tracer: Tracer
    eventBus: TypedEventEmitter
    logger: Logger
}

/** Binds one task to its Task Memory and dispatch tree, from open to curation. */
export class TaskSession {
    readonly tree: DispatchTree
    private state: SessionState = 'open'
    private inFlight = new Set<Promise<DispatchOutcome>>()
    private closing: Promise<SessionCloseReport> | null = null

    constructor(
        readonly taskId: string,
        readonly prompt: string,
        private deps: TaskSessionDeps
    ) {
        this.tree = new DispatchTree(taskId, deps.eventBus)
    }

    get status(): SessionState {
        return this.state
    }

    async run(input: RunInput = {}): Promise<DispatchOutcome> {
        if (this.state !== 'open') throw new SessionClosedError(this.taskId)

        const trace = this.deps.tracer.getTrace(this.taskId)
        const pending = this.deps.router.dispatch(
            { task: input.task ?? this.prompt, role: input.role, context: input.context },
            { taskId: this.taskId, tree: this.tree, parentSpan: trace?.rootSpan, signal: input.signal }
        )
        this.inFlight.add(pending)
        try {
            return await pending
        } finally {
            this.inFlight.delete(pending)
        }
    }

    /** Waits for running dispatches, curates the task and archives its memory. Repeat calls share one close. */
    close(): Promise<SessionCloseReport> {
        this.closing ??= this.finish().catch((error: unknown) => {
            // curation is idempotent, so a failed close can be retried
            this.closing = null
            throw error
        })
        return this.closing
    }

    private async finish(): Promise<SessionCloseReport> {
        const { memory, curator, tracer, eventBus, logger } = this.deps
        this.state = 'closing'

        await Promise.allSettled([...this.inFlight])

        const curationSpan = tracer.startSpan('curation', 'curate', { taskId: this.taskId })
        let curation: CurationReport
        try {
            curation = await curator.curateTask(this.taskId)
        } catch (error) {
            tracer.endSpan(curationSpan, 'error')
            throw error
        }
        tracer.endSpan(curationSpan)

        const taskMemory = await memory.archiveTaskMemory(this.taskId)
        tracer.endTrace(this.taskId)
        this.state = 'closed'

        eventBus.emit('session:close', {
            taskId: this.taskId,
            promoted: curation.promoted.length,
            dismissed: curation.dismissed.length,
            disputed: curation.disputed.length,
            failed: curation.failed.length,
        })
        logger.info({ taskId: this.taskId, dispatches: this.tree.list().length, declined: this.tree.declined.length }, 'session:close')

        return {
            taskId: this.taskId,
            curation,
            taskMemory,
            dispatches: this.tree.list(),
            declined: this.tree.declined,
        }
    }
}
