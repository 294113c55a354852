import { randomUUID } from 'node:crypto'
import type { Logger } from '../logger/index.js'
import type { Span, SpanKind, SpanStatus, Trace } from './types.js'

function createSpan(kind: SpanKind, name: string, attributes: Record<string, unknown> = {}): Span {
    const span: Span = {
        id: randomUUID(),
        kind,
        name,
        startTime: Date.now(),
        attributes,
        children: [],
        end() {
            span.endTime ??= Date.now()
            return span.endTime - span.startTime
        },
    }
    return span
}

export interface StartSpanOptions {
    /** Span to nest under; defaults to the trace root of `taskId`. */
    parent?: Span
    taskId?: string
    attributes?: Record<string, unknown>
}

/**
 * One span tree per task session. Dispatches run concurrently, so spans name
 * their parent instead of relying on a call stack.
 */
export class Tracer {
    private traces = new Map<string, Trace>()

    constructor(private logger: Logger) {}

    startTrace(taskId: string): Trace {
        const existing = this.traces.get(taskId)
        if (existing) return existing

        const trace: Trace = {
            id: randomUUID(),
            taskId,
            rootSpan: createSpan('session', taskId),
            startTime: Date.now(),
        }
        this.traces.set(taskId, trace)
        return trace
    }

    startSpan(kind: SpanKind, name: string, options: StartSpanOptions = {}): Span {
        const span = createSpan(kind, name, options.attributes)
        const parent = options.parent ?? (options.taskId ? this.traces.get(options.taskId)?.rootSpan : undefined)
        parent?.children.push(span)
        this.logger.debug({ spanId: span.id, kind, name }, 'span:start')
        return span
    }

    endSpan(span: Span, status: SpanStatus = 'ok'): number {
        span.status ??= status
        const duration = span.end()
        this.logger.debug({ spanId: span.id, duration, status: span.status }, 'span:end')
        return duration
    }

    endTrace(taskId: string): Trace | null {
        const trace = this.traces.get(taskId)
        if (!trace) return null
        trace.rootSpan.end()
        trace.endTime = Date.now()
        this.traces.delete(taskId)
        return trace
    }

    getTrace(taskId: string): Trace | null {
        return this.traces.get(taskId) ?? null
    }
}
