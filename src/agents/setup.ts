import { CodeAgent } from './code/code-agent.js'
import { DataAgent } from './data/data-agent.js'
import { OrchestratorAgent } from './orchestrator/orchestrator-agent.js'
import { AgentRegistry } from './registry.js'
import { ResearchAgent } from './research/research-agent.js'
import { WritingAgent } from './writing/writing-agent.js'

export function createAgentRegistry(): AgentRegistry {
    const registry = new AgentRegistry()

    registry.register(new OrchestratorAgent())
    registry.register(new ResearchAgent())
    registry.register(new CodeAgent())
    registry.register(new DataAgent())
    registry.register(new WritingAgent())

    return registry
}
