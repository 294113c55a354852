import type { DispatchableRole } from '../core/types.js'
import type { BaseAgent } from './base-agent.js'

export class AgentRegistry {
    private agents = new Map<DispatchableRole, BaseAgent>()

    register(agent: BaseAgent): void {
        this.agents.set(agent.role, agent)
    }

    get(role: DispatchableRole): BaseAgent | undefined {
        return this.agents.get(role)
    }

    getAll(): BaseAgent[] {
        return [...this.agents.values()]
    }

    has(role: DispatchableRole): boolean {
        return this.agents.has(role)
    }
}
