import type { BaseAgent } from '../agents/base-agent.js'
import type { AgentRegistry } from '../agents/registry.js'
import type { AgentRunner } from '../agents/runner.js'
import type { AgentRunResult } from '../agents/types.js'
import type { ResolvedConfig } from '../config/schema.js'
import { DepthExceededError, errorMessage, StrataError, toError } from '../core/errors.js'
import { type Caller, type CanonScope, type DispatchableRole, MAX_DISPATCH_DEPTH } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { AgentMemoryView, MemoryStore } from '../memory/store.js'
import type { Tracer } from '../tracing/tracer.js'
import type { Span, SpanStatus } from '../tracing/types.js'
import { childDepth, createHandle } from './handle.js'
import type { DispatchTree } from './tree.js'
import type { AgentHandle, DispatchOutcome, DispatchRequest } from './types.js'

export interface DispatchRouterDeps {
    memory: MemoryStore
    runner: AgentRunner
    agents: AgentRegistry
    config: Pick<ResolvedConfig, 'canonScopes' | 'agentTimeouts'>
    tracer: Tracer
    logger: Logger
}

export interface DispatchContext {
    taskId: string
    tree: DispatchTree
    parent?: AgentHandle
    parentSpan?: Span
    signal?: AbortSignal
}

const TASK_MEMORY_OUTPUT_LIMIT = 500

function truncate(text: string, limit: number): string {
    return text.length > limit ? `${text.slice(0, limit)}…` : text
}

function errorInfo(error: unknown): DispatchOutcome['error'] {
    if (error instanceof StrataError) return { code: error.code, message: error.message }
    return { code: 'UNKNOWN', message: errorMessage(error) }
}

/**
 * Drives each dispatch through requested → scoped → invoked → terminal.
 * Children of one turn run concurrently; the parent resumes once every child
 * is terminal or has timed out.
 */
export class DispatchRouter {
    constructor(private deps: DispatchRouterDeps) {}

    async fanOut(requests: DispatchRequest[], ctx: DispatchContext): Promise<DispatchOutcome[]> {
        return Promise.all(requests.map((request) => this.dispatch(request, ctx)))
    }

    async dispatch(request: DispatchRequest, ctx: DispatchContext): Promise<DispatchOutcome> {
        const role: DispatchableRole = request.role ?? 'orchestrator'
        const depth = childDepth(ctx.parent)
        const { logger, tracer } = this.deps

        if (depth > MAX_DISPATCH_DEPTH) {
            const error = new DepthExceededError(depth, MAX_DISPATCH_DEPTH)
            ctx.tree.decline({ parentId: ctx.parent?.id ?? null, role, requestedDepth: depth, task: request.task })
            logger.info({ taskId: ctx.taskId, role, depth, parentId: ctx.parent?.id }, 'dispatch:declined')
            return {
                nodeId: null,
                role,
                depth,
                status: 'declined',
                output: error.message,
                error: errorInfo(error),
                partialFailure: false,
                tokenUsage: { prompt: 0, completion: 0 },
            }
        }

        const handle = createHandle(role, ctx.taskId, ctx.parent)
        ctx.tree.add(handle, request.task)
        const span = tracer.startSpan('dispatch', role, {
            parent: ctx.parentSpan,
            taskId: ctx.taskId,
            attributes: { nodeId: handle.id, depth, via: request.via },
        })

        let status: SpanStatus = 'error'
        try {
            const outcome = await this.invoke(handle, request, ctx, span)
            if (outcome.status === 'completed') status = 'ok'
            return outcome
        } finally {
            tracer.endSpan(span, status)
            this.deps.memory.clearScratch(handle.id, ctx.taskId)
        }
    }

    private canonScopeFor(role: DispatchableRole, request: DispatchRequest): CanonScope {
        return request.canonScope ?? this.deps.config.canonScopes[role] ?? []
    }

    private timeoutMs(agent: BaseAgent): number {
        return (this.deps.config.agentTimeouts[agent.role] ?? agent.timeout).max * 1000
    }

    private async invoke(handle: AgentHandle, request: DispatchRequest, ctx: DispatchContext, span: Span): Promise<DispatchOutcome> {
        const { tree } = ctx
        const { logger } = this.deps
        const base = { nodeId: handle.id, role: handle.role, depth: handle.depth }
        const failed = (error: unknown, tokenUsage = { prompt: 0, completion: 0 }, partialFailure = false): DispatchOutcome => {
            tree.transition(handle.id, 'failed', errorMessage(error))
            logger.warn({ taskId: ctx.taskId, nodeId: handle.id, role: handle.role, error: errorMessage(error) }, 'dispatch:failed')
            return { ...base, status: 'failed', output: errorMessage(error), error: errorInfo(error), partialFailure, tokenUsage }
        }

        const agent = this.deps.agents.get(handle.role)
        if (!agent) return failed(new StrataError(`No agent registered for role '${handle.role}'`, 'INFERENCE_FAILURE', 'permanent'))

        const caller: Caller = {
            agentId: handle.id,
            role: handle.role,
            taskId: ctx.taskId,
            canonScope: this.canonScopeFor(handle.role, request),
        }
        tree.transition(handle.id, 'scoped')

        let memory: AgentMemoryView
        try {
            memory = this.deps.memory.viewFor(caller)
        } catch (error) {
            return failed(error)
        }

        const controller = new AbortController()
        const onParentAbort = () => {
            memory.revoke()
            controller.abort()
        }
        if (ctx.signal?.aborted) controller.abort()
        ctx.signal?.addEventListener('abort', onParentAbort, { once: true })

        let partialFailure = false
        const childCtx: DispatchContext = { taskId: ctx.taskId, tree, parent: handle, parentSpan: span, signal: controller.signal }

        tree.transition(handle.id, 'invoked')
        logger.debug({ taskId: ctx.taskId, nodeId: handle.id, role: handle.role, depth: handle.depth }, 'dispatch:invoked')

        const run: Promise<AgentRunResult | 'timeout'> = this.deps.runner
            .run(agent, {
                handle,
                caller,
                task: request.task,
                context: request.context,
                memory,
                signal: controller.signal,
                span,
                delegate: async (requests) => {
                    tree.transition(handle.id, 'delegated')
                    const outcomes = await this.fanOut(requests, childCtx)
                    if (outcomes.some((o) => o.status !== 'completed')) partialFailure = true
                    tree.transition(handle.id, 'invoked')
                    return outcomes
                },
            })
            .catch((error: unknown) => ({
                status: 'failed' as const,
                output: errorMessage(error),
                error: toError(error),
                turns: 0,
                tokenUsage: { prompt: 0, completion: 0 },
                rejectedDispatches: 0,
            }))

        let timer: ReturnType<typeof setTimeout> | undefined
        const timeout = new Promise<'timeout'>((resolve) => {
            timer = setTimeout(() => resolve('timeout'), this.timeoutMs(agent))
        })

        let result: AgentRunResult | 'timeout'
        try {
            result = await Promise.race([run, timeout])
        } finally {
            clearTimeout(timer)
            ctx.signal?.removeEventListener('abort', onParentAbort)
        }

        if (result === 'timeout') {
            // the run may still resolve; nothing it does from here on may land in memory
            memory.revoke()
            controller.abort()
            return failed(new StrataError(`${handle.role} agent timed out`, 'TIMEOUT', 'transient'), undefined, partialFailure)
        }

        partialFailure ||= result.rejectedDispatches > 0
        if (result.status === 'failed') {
            memory.revoke()
            return failed(result.error ?? new Error(result.output), result.tokenUsage, partialFailure)
        }

        if (result.output) {
            try {
                await memory.appendTaskMemory(truncate(result.output, TASK_MEMORY_OUTPUT_LIMIT), `output:${handle.role}`)
            } catch (error) {
                logger.warn({ taskId: ctx.taskId, nodeId: handle.id, error: errorMessage(error) }, 'dispatch:output-not-recorded')
            }
        }

        memory.revoke()
        tree.transition(handle.id, 'completed')
        return { ...base, status: 'completed', output: result.output, partialFailure, tokenUsage: result.tokenUsage }
    }
}
