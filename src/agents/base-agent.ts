import { AGENT_TIMEOUTS, type DispatchableRole, MAX_DISPATCH_DEPTH } from '../core/types.js'
import type { AgentHandle } from '../dispatch/types.js'

export const MEMORY_TOOLS = ['write_to_buffer', 'write_to_scratch', 'read_scratch', 'write_to_task_memory', 'read_task_memory', 'read_canon']

export abstract class BaseAgent {
    abstract readonly role: DispatchableRole

    get timeout(): { default: number; max: number } {
        return AGENT_TIMEOUTS[this.role]
    }

    get maxTurns(): number {
        return 25
    }

    abstract get allowedTools(): string[]

    abstract get systemPrompt(): string

    buildSystemPrompt(handle: AgentHandle): string {
        let prompt = this.systemPrompt
        if (handle.depth >= MAX_DISPATCH_DEPTH) {
            prompt += `\n\nYou are at the maximum dispatch depth (${MAX_DISPATCH_DEPTH}). You cannot delegate; finish the task with what you can gather yourself.`
        } else {
            prompt += `\n\nYou are at dispatch depth ${handle.depth} of ${MAX_DISPATCH_DEPTH}.`
        }
        return prompt
    }

    formatTask(description: string, context?: string): string {
        let prompt = description
        if (context) {
            prompt += `\n\nAdditional context:\n${context}`
        }
        return prompt
    }
}
