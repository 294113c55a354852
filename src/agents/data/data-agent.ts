import type { DispatchableRole } from '../../core/types.js'
import { BaseAgent, MEMORY_TOOLS } from '../base-agent.js'
import { DATA_SYSTEM_PROMPT } from './system-prompt.js'

export class DataAgent extends BaseAgent {
    readonly role: DispatchableRole = 'data'

    get allowedTools(): string[] {
        return [...MEMORY_TOOLS]
    }

    get systemPrompt(): string {
        return DATA_SYSTEM_PROMPT
    }
}
