import { z } from 'zod'
import { formatCanon } from '../../memory/context-builder.js'
import type { Tool } from '../types.js'

const ReadCanonInput = z.object({
    keys: z.array(z.string()).optional().describe('Exact keys to read (default: every key you may see)'),
    prefix: z.string().optional().describe("Only keys starting with this prefix, e.g. 'facts/'"),
})

type ReadCanonInput = z.infer<typeof ReadCanonInput>

export const readCanonTool: Tool<ReadCanonInput, string> = {
    name: 'read_canon',
    description: 'Read verified Canon entries within your scope',
    parameters: ReadCanonInput,
    requiredAccess: { layer: 'canon', verb: 'read' },
    async execute(input, ctx) {
        const slice = ctx.memory.readCanon(input.keys)
        const { prefix } = input
        const visible = prefix
            ? Object.fromEntries(Object.entries(slice).filter(([key]) => key.startsWith(prefix)))
            : slice
        return formatCanon(visible) || 'No Canon entries in scope'
    },
}

const WriteToCanonInput = z.object({
    key: z.string().min(1).describe("Canon key, e.g. 'decisions/storage_engine'"),
    value: z.union([z.string(), z.number()]).describe('Verified value'),
    confidence: z.number().min(0).max(1).describe('Confidence in the value, 0 to 1'),
    source: z.string().optional().describe('Evidence for the value'),
})

type WriteToCanonInput = z.infer<typeof WriteToCanonInput>

export const writeToCanonTool: Tool<WriteToCanonInput, string> = {
    name: 'write_to_canon',
    description:
        'Promote a verified value into Canon. A value that conflicts with the current Canon entry is recorded as a dispute instead.',
    parameters: WriteToCanonInput,
    requiredAccess: { layer: 'canon', verb: 'write' },
    async execute(input, ctx) {
        const outcome = await ctx.curator.promoteClaim(
            {
                taskId: ctx.memory.taskId,
                key: input.key,
                claim: input.value,
                confidence: input.confidence,
                source: input.source ?? `agent:${ctx.role}`,
            },
            ctx.caller
        )
        if (outcome.status === 'disputed') {
            return `Conflicts with Canon '${input.key}' v${outcome.dispute.existingCanonVersion}; recorded as dispute ${outcome.dispute.id}`
        }
        return outcome.entry
            ? `Canon '${input.key}' is now at version ${outcome.entry.version}`
            : `Canon '${input.key}' already holds this claim`
    },
}
