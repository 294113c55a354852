import type { ChatParams, ChatResponse, LLMClient, ToolCall } from '../../src/llm/types.js'

export interface ScriptedResponse {
    content: string | null
    toolCalls?: ToolCall[]
    finishReason?: 'stop' | 'tool_calls' | 'length'
    usage?: { promptTokens: number; completionTokens: number }
    /** Resolve only after this many ms, or reject when the request is aborted first. */
    delayMs?: number
    /** Keep waiting out `delayMs` even after the request is aborted, like a backend that never sees the cancel. */
    ignoreAbort?: boolean
    error?: Error
}

export interface CapturedCall {
    params: ChatParams
    agent: string
    timestamp: number
}

const ROLE_MARKERS: [string, string][] = [
    ['You are the Orchestrator', 'orchestrator'],
    ['You are the Research Agent', 'research'],
    ['You are the Code Agent', 'code'],
    ['You are the Data Agent', 'data'],
    ['You are the Writing Agent', 'writing'],
]

/** `role@depth` of the agent issuing a request, read from its system prompt. */
export function agentKeyOf(params: ChatParams): string {
    const system = params.messages.find((m) => m.role === 'system')?.content ?? ''
    const role = ROLE_MARKERS.find(([marker]) => system.includes(marker))?.[1] ?? 'unknown'
    const depth = /dispatch depth (\d+) of/.exec(system)?.[1] ?? /maximum dispatch depth \((\d+)\)/.exec(system)?.[1] ?? '?'
    return `${role}@${depth}`
}

function abortError(): DOMException {
    return new DOMException('The operation was aborted.', 'AbortError')
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const timer = setTimeout(resolve, ms)
        signal?.addEventListener(
            'abort',
            () => {
                clearTimeout(timer)
                reject(abortError())
            },
            { once: true }
        )
    })
}

/**
 * Replays scripted responses. A plain array is consumed in call order; a
 * record is keyed by `role@depth` so concurrent agents each follow their own
 * script.
 */
export class ScriptedLLMClient implements LLMClient {
    readonly capturedCalls: CapturedCall[] = []
    private sequence: ScriptedResponse[]
    private byAgent: Map<string, ScriptedResponse[]>

    constructor(responses: ScriptedResponse[] | Record<string, ScriptedResponse[]>) {
        if (Array.isArray(responses)) {
            this.sequence = [...responses]
            this.byAgent = new Map()
        } else {
            this.sequence = []
            this.byAgent = new Map(Object.entries(responses).map(([key, list]) => [key, [...list]]))
        }
    }

    async chat(params: ChatParams): Promise<ChatResponse> {
        if (params.signal?.aborted) throw abortError()

        const agent = agentKeyOf(params)
        // the runner keeps mutating its message list
        this.capturedCalls.push({ params: { ...params, messages: [...params.messages] }, agent, timestamp: Date.now() })

        const queue = this.byAgent.size > 0 ? this.byAgent.get(agent) : this.sequence
        const scripted = queue?.shift()
        if (!scripted) {
            throw new Error(`ScriptedLLMClient: no scripted response left for ${agent} (call ${this.capturedCalls.length})`)
        }

        if (scripted.delayMs) await wait(scripted.delayMs, scripted.ignoreAbort ? undefined : params.signal)
        if (scripted.error) throw scripted.error

        return {
            content: scripted.content,
            toolCalls: scripted.toolCalls ?? [],
            finishReason: scripted.finishReason ?? (scripted.toolCalls?.length ? 'tool_calls' : 'stop'),
            usage: scripted.usage ?? { promptTokens: 10, completionTokens: 10 },
        }
    }

    static fromStrings(strings: string[]): ScriptedLLMClient {
        return new ScriptedLLMClient(strings.map((s) => ({ content: s, finishReason: 'stop' as const })))
    }

    callsFor(agent: string): CapturedCall[] {
        return this.capturedCalls.filter((call) => call.agent === agent)
    }

    getCall(index: number): CapturedCall {
        const call = this.capturedCalls[index]
        if (!call) {
            throw new Error(`ScriptedLLMClient: no call at index ${index} (only ${this.capturedCalls.length} calls captured)`)
        }
        return call
    }

    toolNames(index: number): string[] {
        return (this.getCall(index).params.tools ?? []).map((t) => t.function.name)
    }

    get totalCalls(): number {
        return this.capturedCalls.length
    }
}

let callCounter = 0

export function makeToolCall(name: string, args: Record<string, unknown> = {}): ToolCall {
    callCounter++
    return {
        id: `call_${callCounter}`,
        type: 'function',
        function: { name, arguments: JSON.stringify(args) },
    }
}

export function makeScriptedResponse(content: string): ScriptedResponse {
    return { content, finishReason: 'stop' }
}

export function makeToolCallResponse(toolCalls: ToolCall[], content?: string): ScriptedResponse {
    return {
        content: content ?? null,
        toolCalls,
        finishReason: 'tool_calls',
    }
}
