import type { DispatchableRole } from '../../core/types.js'
import { BaseAgent, MEMORY_TOOLS } from '../base-agent.js'
import { WRITING_SYSTEM_PROMPT } from './system-prompt.js'

export class WritingAgent extends BaseAgent {
    readonly role: DispatchableRole = 'writing'

    get maxTurns(): number {
        return 15
    }

    get allowedTools(): string[] {
        return [...MEMORY_TOOLS]
    }

    get systemPrompt(): string {
        return WRITING_SYSTEM_PROMPT
    }
}
