import { errorMessage, InferenceFailureError, isAbortError, StrataError, toError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Result } from '../core/result.js'
import type { Caller } from '../core/types.js'
import type { Curator } from '../curation/curator.js'
import { dispatchToolDefinitions, isDispatchTool, parseDispatchCall, roleMayDispatch } from '../dispatch/tools.js'
import type { AgentHandle, DispatchOutcome, DispatchRequest } from '../dispatch/types.js'
import type { ModelRouter } from '../llm/model-router.js'
import type { ChatMessage, ChatResponse, LLMClient, ToolCall } from '../llm/types.js'
import { buildAgentContext } from '../memory/context-builder.js'
import type { AgentMemoryView } from '../memory/store.js'
import type { SearchProvider } from '../search/types.js'
import type { ToolExecutor } from '../tools/executor.js'
import type { ToolRegistry } from '../tools/registry.js'
import type { ToolContext } from '../tools/types.js'
import type { Tracer } from '../tracing/tracer.js'
import type { Span } from '../tracing/types.js'
import type { BaseAgent } from './base-agent.js'
import type { AgentRunResult, DelegateFn } from './types.js'

export interface AgentRunnerDeps {
    llmClient: LLMClient
    toolExecutor: ToolExecutor
    toolRegistry: ToolRegistry
    tracer: Tracer
    eventBus: TypedEventEmitter
    modelRouter: ModelRouter
    curator: Curator
    search: SearchProvider
    searchMaxResults: number
    tokenBudget: { target: number; hardCap: number }
    maxTurns?: number
}

export interface AgentRunInput {
    handle: AgentHandle
    caller: Caller
    task: string
    context?: string
    memory: AgentMemoryView
    delegate: DelegateFn
    signal: AbortSignal
    span?: Span
}

function formatToolResult(result: Result<string>): string {
    if (result.ok) return result.value
    return `ERROR: ${result.error}`
}

export function formatDispatchOutcome(outcome: DispatchOutcome): string {
    switch (outcome.status) {
        case 'completed':
            return outcome.partialFailure
                ? `${outcome.output}\n\n[note: some of this ${outcome.role} agent's sub-dispatches failed]`
                : outcome.output
        case 'declined':
            return `DECLINED: ${outcome.error?.message ?? outcome.output}. Continue with what you have.`
        case 'failed':
            return `ERROR: ${outcome.role} agent failed (${outcome.error?.code ?? 'UNKNOWN'}): ${outcome.error?.message ?? outcome.output}`
    }
}

export class AgentRunner {
    constructor(private deps: AgentRunnerDeps) {}

    private systemPrompt(agent: BaseAgent, input: AgentRunInput): string {
        const { prompt, manifest } = buildAgentContext(agent.buildSystemPrompt(input.handle), input.memory, this.deps.tokenBudget)
        if (input.span) {
            input.span.attributes.contextTokens = manifest.totalTokens
            input.span.attributes.droppedSections = manifest.sections.filter((s) => !s.included).map((s) => s.label)
        }
        return prompt
    }

    async run(agent: BaseAgent, input: AgentRunInput): Promise<AgentRunResult> {
        const { handle, signal } = input
        const { eventBus, tracer } = this.deps
        const started = Date.now()
        const usage = { prompt: 0, completion: 0 }
        let rejectedDispatches = 0
        const maxTurns = Math.min(agent.maxTurns, this.deps.maxTurns ?? agent.maxTurns)
        const model = this.deps.modelRouter.resolve(agent.role)
        const tools = [...this.deps.toolRegistry.getToolDefinitions(agent.role), ...dispatchToolDefinitions(agent.role, handle.depth)]

        eventBus.emit('agent:start', { role: agent.role, taskId: handle.taskId, agentId: handle.id })

        const fail = (error: Error, turns: number): AgentRunResult => {
            eventBus.emit('agent:error', { role: agent.role, taskId: handle.taskId, agentId: handle.id, error })
            return { status: 'failed', output: errorMessage(error), error, turns, tokenUsage: usage, rejectedDispatches }
        }

        const messages: ChatMessage[] = [
            { role: 'system', content: this.systemPrompt(agent, input) },
            { role: 'user', content: agent.formatTask(input.task, input.context) },
        ]

        for (let turn = 0; turn < maxTurns; turn++) {
            if (signal.aborted) return fail(new StrataError('Agent aborted', 'TIMEOUT', 'transient'), turn)

            // memory may have changed while children ran
            messages[0] = { role: 'system', content: this.systemPrompt(agent, input) }

            let response: ChatResponse
            const llmSpan = tracer.startSpan('llm_call', model, { parent: input.span, attributes: { turn } })
            try {
                response = await this.deps.llmClient.chat({
                    model,
                    messages,
                    tools: tools.length > 0 ? tools : undefined,
                    signal,
                })
            } catch (error) {
                llmSpan.status = 'error'
                if (isAbortError(error) || signal.aborted) {
                    return fail(new StrataError('Agent aborted', 'TIMEOUT', 'transient', { cause: error }), turn)
                }
                return fail(new InferenceFailureError(`Inference failed: ${errorMessage(error)}`, { cause: error }), turn)
            } finally {
                tracer.endSpan(llmSpan)
            }

            if (signal.aborted) return fail(new StrataError('Agent aborted', 'TIMEOUT', 'transient'), turn + 1)

            usage.prompt += response.usage.promptTokens
            usage.completion += response.usage.completionTokens
            eventBus.emit('token:usage', {
                role: agent.role,
                prompt: response.usage.promptTokens,
                completion: response.usage.completionTokens,
            })

            if (response.toolCalls.length === 0) {
                eventBus.emit('agent:complete', {
                    role: agent.role,
                    taskId: handle.taskId,
                    agentId: handle.id,
                    duration: Date.now() - started,
                })
                return {
                    status: 'completed',
                    output: response.content ?? '',
                    turns: turn + 1,
                    tokenUsage: usage,
                    rejectedDispatches,
                }
            }

            messages.push({ role: 'assistant', content: response.content, tool_calls: response.toolCalls })

            const { results, rejected } = await this.executeToolCalls(agent, input, response.toolCalls)
            rejectedDispatches += rejected
            for (const call of response.toolCalls) {
                messages.push({ role: 'tool', tool_call_id: call.id, content: results.get(call.id) ?? 'ERROR: no result' })
            }
        }

        return fail(new StrataError(`Max turns reached (${maxTurns})`, 'INFERENCE_FAILURE', 'permanent'), maxTurns)
    }

    /**
     * Memory tools run in call order; dispatch calls of the same turn are
     * handed to the router together and run concurrently.
     */
    private async executeToolCalls(
        agent: BaseAgent,
        input: AgentRunInput,
        calls: ToolCall[]
    ): Promise<{ results: Map<string, string>; rejected: number }> {
        const results = new Map<string, string>()
        let rejected = 0
        const dispatches: { callId: string; request: DispatchRequest }[] = []

        const ctx: ToolContext = {
            role: agent.role,
            caller: input.caller,
            memory: input.memory,
            curator: this.deps.curator,
            search: this.deps.search,
            searchMaxResults: this.deps.searchMaxResults,
            signal: input.signal,
            span: input.span,
        }

        for (const call of calls) {
            const name = call.function.name
            if (input.signal.aborted) {
                results.set(call.id, 'ERROR: Agent aborted')
                continue
            }

            if (isDispatchTool(name)) {
                if (!roleMayDispatch(agent.role, name)) {
                    rejected++
                    results.set(call.id, `ERROR: Permission denied: ${agent.role} may not use '${name}'`)
                    continue
                }
                try {
                    dispatches.push({ callId: call.id, request: parseDispatchCall(call) })
                } catch (error) {
                    rejected++
                    results.set(call.id, `ERROR: ${errorMessage(error)}`)
                }
                continue
            }

            let args: unknown
            try {
                args = JSON.parse(call.function.arguments || '{}')
            } catch {
                args = {}
            }

            this.deps.eventBus.emit('tool:before', { toolName: name, role: agent.role, args })
            const toolStart = Date.now()
            const result = await this.deps.toolExecutor.executeSafe(name, args, ctx)
            this.deps.eventBus.emit('tool:after', {
                toolName: name,
                role: agent.role,
                duration: Date.now() - toolStart,
                success: result.ok,
            })
            results.set(call.id, formatToolResult(result))
        }

        if (dispatches.length > 0 && input.signal.aborted) {
            for (const d of dispatches) results.set(d.callId, 'ERROR: Agent aborted')
        } else if (dispatches.length > 0) {
            try {
                const outcomes = await input.delegate(dispatches.map((d) => d.request))
                dispatches.forEach((d, i) => {
                    const outcome = outcomes[i]
                    results.set(d.callId, outcome ? formatDispatchOutcome(outcome) : 'ERROR: dispatch produced no outcome')
                })
            } catch (error) {
                const message = errorMessage(toError(error))
                for (const d of dispatches) results.set(d.callId, `ERROR: ${message}`)
            }
        }

        return { results, rejected }
    }
}
