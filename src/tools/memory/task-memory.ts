import { z } from 'zod'
import { formatTaskMemory } from '../../memory/context-builder.js'
import type { Tool } from '../types.js'

const WriteToTaskMemoryInput = z.object({
    content: z.string().min(1).describe('Progress, intermediate result or decision to share with the other agents of this task'),
    label: z.string().optional().describe("Short label, e.g. 'finding' or 'plan'"),
})

type WriteToTaskMemoryInput = z.infer<typeof WriteToTaskMemoryInput>

export const writeToTaskMemoryTool: Tool<WriteToTaskMemoryInput, string> = {
    name: 'write_to_task_memory',
    description: 'Append to the shared Task Memory, readable by every agent working on this task',
    parameters: WriteToTaskMemoryInput,
    requiredAccess: { layer: 'task', verb: 'append' },
    async execute(input, ctx) {
        await ctx.memory.appendTaskMemory(input.content, input.label)
        return 'Task Memory updated'
    },
}

const ReadTaskMemoryInput = z.object({})

type ReadTaskMemoryInput = z.infer<typeof ReadTaskMemoryInput>

export const readTaskMemoryTool: Tool<ReadTaskMemoryInput, string> = {
    name: 'read_task_memory',
    description: 'Read the shared Task Memory of this task',
    parameters: ReadTaskMemoryInput,
    requiredAccess: { layer: 'task', verb: 'read' },
    async execute(_input, ctx) {
        return formatTaskMemory(ctx.memory.readTaskMemory())
    },
}
