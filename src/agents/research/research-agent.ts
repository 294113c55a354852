import type { DispatchableRole } from '../../core/types.js'
import { BaseAgent, MEMORY_TOOLS } from '../base-agent.js'
import { RESEARCH_SYSTEM_PROMPT } from './system-prompt.js'

export class ResearchAgent extends BaseAgent {
    readonly role: DispatchableRole = 'research'

    get allowedTools(): string[] {
        return [...MEMORY_TOOLS, 'web_search']
    }

    get systemPrompt(): string {
        return RESEARCH_SYSTEM_PROMPT
    }
}
