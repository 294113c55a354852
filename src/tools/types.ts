import type { ZodSchema } from 'zod'
import type { Result } from '../core/result.js'
import type { Caller, DispatchableRole, LayerVerb, MemoryLayer } from '../core/types.js'
import type { Curator } from '../curation/curator.js'
import type { AgentMemoryView } from '../memory/store.js'
import type { SearchProvider } from '../search/types.js'
import type { Span } from '../tracing/types.js'

export interface ToolContext {
    role: DispatchableRole
    caller: Caller
    memory: AgentMemoryView
    curator: Curator
    search: SearchProvider
    searchMaxResults: number
    signal?: AbortSignal
    span?: Span
}

export interface LayerAccess {
    layer: MemoryLayer
    verb: LayerVerb
}

export interface Tool<TInput = unknown, TOutput = unknown> {
    name: string
    description: string
    parameters: ZodSchema<TInput>
    /** Checked against the access table before the tool runs. */
    requiredAccess?: LayerAccess
    execute(input: TInput, ctx: ToolContext): Promise<TOutput>
}

export type ToolResult<T = unknown> = Result<T, string>

export type AnyTool = Tool<unknown, unknown>
