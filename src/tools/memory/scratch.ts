import { z } from 'zod'
import type { Tool } from '../types.js'

const WriteToScratchInput = z.object({
    content: z.string().min(1).describe('Private working note'),
})

type WriteToScratchInput = z.infer<typeof WriteToScratchInput>

export const writeToScratchTool: Tool<WriteToScratchInput, string> = {
    name: 'write_to_scratch',
    description: 'Save a private working note. Only you can read it and it is discarded when your sub-task ends.',
    parameters: WriteToScratchInput,
    requiredAccess: { layer: 'scratch', verb: 'write' },
    async execute(input, ctx) {
        const notes = ctx.memory.readScratch().length
        ctx.memory.writeScratch(input.content)
        return `Scratch note ${notes + 1} saved`
    },
}

const ReadScratchInput = z.object({})

type ReadScratchInput = z.infer<typeof ReadScratchInput>

export const readScratchTool: Tool<ReadScratchInput, string> = {
    name: 'read_scratch',
    description: 'Read your private working notes for this task',
    parameters: ReadScratchInput,
    requiredAccess: { layer: 'scratch', verb: 'read' },
    async execute(_input, ctx) {
        const notes = ctx.memory.readScratch()
        if (notes.length === 0) return 'Scratch is empty'
        return notes.map((note, i) => `${i + 1}. ${note.content}`).join('\n')
    },
}
