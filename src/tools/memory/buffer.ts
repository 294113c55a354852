import { z } from 'zod'
import type { Tool } from '../types.js'

const WriteToBufferInput = z.object({
    key: z.string().min(1).describe("Canon key the claim is about, e.g. 'facts/everest_height'"),
    claim: z.union([z.string(), z.number()]).describe('The claim itself; keep it short and factual'),
    source: z.string().optional().describe('Where the claim comes from (URL, tool, reasoning)'),
    confidence: z.number().min(0).max(1).optional().describe('How sure you are, 0 to 1 (default: 0.5)'),
})

type WriteToBufferInput = z.infer<typeof WriteToBufferInput>

export const writeToBufferTool: Tool<WriteToBufferInput, string> = {
    name: 'write_to_buffer',
    description:
        'Record an unverified finding. Buffer claims stay tentative until the Curator promotes them to Canon at the end of the task.',
    parameters: WriteToBufferInput,
    requiredAccess: { layer: 'buffer', verb: 'append' },
    async execute(input, ctx) {
        const entry = await ctx.memory.appendBuffer({
            key: input.key,
            claim: input.claim,
            source: input.source ?? `agent:${ctx.role}`,
            confidence: input.confidence ?? 0.5,
        })
        return `Recorded tentative claim ${entry.id} for '${entry.key}' (confidence ${entry.confidence.toFixed(2)})`
    },
}
