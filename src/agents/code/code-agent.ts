import type { DispatchableRole } from '../../core/types.js'
import { BaseAgent, MEMORY_TOOLS } from '../base-agent.js'
import { CODE_SYSTEM_PROMPT } from './system-prompt.js'

export class CodeAgent extends BaseAgent {
    readonly role: DispatchableRole = 'code'

    get allowedTools(): string[] {
        return [...MEMORY_TOOLS]
    }

    get systemPrompt(): string {
        return CODE_SYSTEM_PROMPT
    }
}
