import type { DispatchableRole } from '../core/types.js'

export interface ModelRouterConfig {
    default: string
    agentModels?: Partial<Record<DispatchableRole, string>>
    costTier?: {
        light: string
        standard: string
        heavy: string
    }
}

const ROLE_COST_TIER: Record<Exclude<DispatchableRole, 'orchestrator'>, 'light' | 'standard' | 'heavy'> = {
    research: 'light',
    code: 'standard',
    data: 'standard',
    writing: 'light',
}

export class ModelRouter {
    constructor(private config: ModelRouterConfig) {}

    resolve(role?: DispatchableRole): string {
        const pinned = role ? this.config.agentModels?.[role] : undefined
        if (pinned) return pinned

        if (role && role !== 'orchestrator' && this.config.costTier) {
            return this.config.costTier[ROLE_COST_TIER[role]]
        }

        return this.config.default
    }
}
