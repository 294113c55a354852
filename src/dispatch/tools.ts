import { z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import { errorMessage, InferenceFailureError } from '../core/errors.js'
import { type DispatchableRole, MAX_DISPATCH_DEPTH, SPECIALIST_ROLES, type SpecialistRole } from '../core/types.js'
import type { ToolCall, ToolDefinition } from '../llm/types.js'
import type { DispatchRequest } from './types.js'

const DelegateInput = z.object({
    task: z.string().min(1).describe('Self-contained description of the sub-task'),
    context: z.string().optional().describe('Findings the agent needs that are not in Task Memory'),
})

const SpawnSubAgentInput = DelegateInput.extend({
    agent_type: z.enum(SPECIALIST_ROLES).describe('Specialist to spawn'),
})

interface DispatchToolSpec {
    name: string
    description: string
    /** Fixed target; undefined when the call names its own target. */
    role?: DispatchableRole
}

const SPECIALIST_TOOL_NAMES: Record<SpecialistRole, string> = {
    research: 'research_agent',
    code: 'code_agent',
    data: 'data_agent',
    writing: 'writing_agent',
}

const DISPATCH_TOOLS: readonly DispatchToolSpec[] = [
    { name: 'research_agent', role: 'research', description: 'Delegate a sub-task to the Research specialist (web search, fact finding)' },
    { name: 'code_agent', role: 'code', description: 'Delegate a sub-task to the Code specialist (writing, reviewing, explaining code)' },
    { name: 'data_agent', role: 'data', description: 'Delegate a sub-task to the Data specialist (analysis, calculations, tabular reasoning)' },
    { name: 'writing_agent', role: 'writing', description: 'Delegate a sub-task to the Writing specialist (drafting, editing, summarising)' },
    {
        name: 'spawn_sub_orchestrator',
        role: 'orchestrator',
        description: 'Hand a complex sub-problem to a sub-orchestrator that can delegate further',
    },
    { name: 'spawn_sub_agent', description: 'Spawn a specialist for a narrow sub-task you cannot finish alone' },
]

export const DISPATCH_TOOL_NAMES: ReadonlySet<string> = new Set(DISPATCH_TOOLS.map((tool) => tool.name))

const ROLE_DISPATCH_TOOLS: Readonly<Record<DispatchableRole, readonly string[]>> = {
    orchestrator: [...SPECIALIST_ROLES.map((role) => SPECIALIST_TOOL_NAMES[role]), 'spawn_sub_orchestrator'],
    research: ['spawn_sub_agent'],
    code: ['spawn_sub_agent'],
    data: ['spawn_sub_agent'],
    writing: ['spawn_sub_agent'],
}

export function isDispatchTool(name: string): boolean {
    return DISPATCH_TOOL_NAMES.has(name)
}

export function roleMayDispatch(role: DispatchableRole, toolName: string): boolean {
    return ROLE_DISPATCH_TOOLS[role].includes(toolName)
}

function toDefinition(spec: DispatchToolSpec): ToolDefinition {
    const schema = spec.role ? DelegateInput : SpawnSubAgentInput
    return {
        type: 'function',
        function: {
            name: spec.name,
            description: spec.description,
            parameters: { ...zodToJsonSchema(schema) },
        },
    }
}

/** Dispatch tools offered to an agent; none once it sits at the depth bound. */
export function dispatchToolDefinitions(role: DispatchableRole, depth: number): ToolDefinition[] {
    if (depth >= MAX_DISPATCH_DEPTH) return []
    return DISPATCH_TOOLS.filter((spec) => roleMayDispatch(role, spec.name)).map(toDefinition)
}

export function parseDispatchCall(call: ToolCall): DispatchRequest {
    const spec = DISPATCH_TOOLS.find((tool) => tool.name === call.function.name)
    if (!spec) throw new InferenceFailureError(`'${call.function.name}' is not a dispatch tool`)

    let args: unknown
    try {
        args = JSON.parse(call.function.arguments || '{}')
    } catch (error) {
        throw new InferenceFailureError(`Unparseable arguments for ${spec.name}: ${errorMessage(error)}`, { cause: error })
    }

    if (spec.role) {
        const parsed = DelegateInput.safeParse(args)
        if (!parsed.success) throw new InferenceFailureError(`Invalid arguments for ${spec.name}: ${parsed.error.message}`)
        return { task: parsed.data.task, context: parsed.data.context, role: spec.role, via: spec.name }
    }

    const parsed = SpawnSubAgentInput.safeParse(args)
    if (!parsed.success) throw new InferenceFailureError(`Invalid arguments for ${spec.name}: ${parsed.error.message}`)
    return { task: parsed.data.task, context: parsed.data.context, role: parsed.data.agent_type, via: spec.name }
}
