import type { DispatchableRole } from '../../core/types.js'
import { BaseAgent, MEMORY_TOOLS } from '../base-agent.js'
import { ORCHESTRATOR_SYSTEM_PROMPT } from './system-prompt.js'

export class OrchestratorAgent extends BaseAgent {
    readonly role: DispatchableRole = 'orchestrator'

    get allowedTools(): string[] {
        return [...MEMORY_TOOLS, 'write_to_canon']
    }

    get systemPrompt(): string {
        return ORCHESTRATOR_SYSTEM_PROMPT
    }
}
