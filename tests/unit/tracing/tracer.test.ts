import { describe, expect, it } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { MetricsCollector } from '../../../src/tracing/metrics.js'
import { Tracer } from '../../../src/tracing/tracer.js'
import { silentLogger } from '../../helpers/fixtures.js'

describe('Tracer', () => {
    it('nests spans under the task trace', () => {
        const tracer = new Tracer(silentLogger)
        const trace = tracer.startTrace('task-1')

        const dispatch = tracer.startSpan('dispatch', 'orchestrator', { taskId: 'task-1' })
        const llm = tracer.startSpan('llm_call', 'model', { parent: dispatch, attributes: { turn: 0 } })
        tracer.endSpan(llm, 'error')
        tracer.endSpan(dispatch)

        expect(trace.rootSpan.children).toEqual([dispatch])
        expect(dispatch.children).toEqual([llm])
        expect(llm).toMatchObject({ status: 'error', attributes: { turn: 0 } })
        expect(dispatch.status).toBe('ok')
        expect(llm.endTime).toBeTypeOf('number')
    })

    it('keeps the first status a span ends with', () => {
        const tracer = new Tracer(silentLogger)
        const span = tracer.startSpan('tool', 'read_canon')
        span.status = 'error'
        tracer.endSpan(span)
        expect(span.status).toBe('error')
    })

    it('returns the same trace for a task until it ends', () => {
        const tracer = new Tracer(silentLogger)
        const trace = tracer.startTrace('task-1')
        expect(tracer.startTrace('task-1')).toBe(trace)

        expect(tracer.endTrace('task-1')?.endTime).toBeTypeOf('number')
        expect(tracer.getTrace('task-1')).toBeNull()
        expect(tracer.endTrace('task-1')).toBeNull()
    })
})

describe('MetricsCollector', () => {
    it('aggregates agent, token, dispatch and curation events', () => {
        const bus = new TypedEventEmitter()
        const metrics = new MetricsCollector(bus)

        bus.emit('agent:start', { role: 'research', taskId: 't', agentId: 'research-1' })
        bus.emit('token:usage', { role: 'research', prompt: 100, completion: 20 })
        bus.emit('tool:after', { toolName: 'web_search', role: 'research', duration: 5, success: true })
        bus.emit('agent:error', { role: 'research', taskId: 't', agentId: 'research-1', error: new Error('x') })
        bus.emit('dispatch:declined', { taskId: 't', parentId: 'data-1', role: 'code', requestedDepth: 4 })
        bus.emit('session:close', { taskId: 't', promoted: 2, dismissed: 1, disputed: 1, failed: 0 })

        expect(metrics.getSessionTokens()).toEqual({ prompt: 100, completion: 20, total: 120 })
        expect(metrics.getRoleMetrics().get('research')).toEqual({
            invocations: 1,
            totalDuration: 0,
            errors: 1,
            promptTokens: 100,
            completionTokens: 20,
            toolCalls: 1,
        })
        expect(metrics.getDeclinedDispatches()).toBe(1)
        expect(metrics.formatStatus()).toBe(
            [
                'Session tokens: 120 (100p + 20c)',
                'Agent metrics:',
                '  research: 1 calls, 1 tools, 1 errors, 120 tokens',
                'Declined dispatches: 1',
                'Curation: 2 promoted, 1 dismissed, 1 disputed, 0 failed',
            ].join('\n')
        )
    })

    it('stops listening once disposed', () => {
        const bus = new TypedEventEmitter()
        const metrics = new MetricsCollector(bus)
        metrics.dispose()
        bus.emit('token:usage', { role: 'code', prompt: 1, completion: 1 })
        expect(metrics.getSessionTokens().total).toBe(0)
    })
})
