import { zodToJsonSchema } from 'zod-to-json-schema'
import type { DispatchableRole } from '../core/types.js'
import type { ToolDefinition } from '../llm/types.js'
import type { AnyTool } from './types.js'

export class ToolRegistry {
    private tools = new Map<string, AnyTool>()
    private roleTools = new Map<DispatchableRole, string[]>()
    private definitionCache = new Map<DispatchableRole, ToolDefinition[]>()

    register(tool: AnyTool): void {
        this.tools.set(tool.name, tool)
        this.definitionCache.clear()
    }

    registerForRole(role: DispatchableRole, toolNames: string[]): void {
        this.roleTools.set(role, toolNames)
        this.definitionCache.delete(role)
    }

    get(name: string): AnyTool | undefined {
        return this.tools.get(name)
    }

    isAllowed(role: DispatchableRole, name: string): boolean {
        return this.roleTools.get(role)?.includes(name) ?? false
    }

    getToolsForRole(role: DispatchableRole): AnyTool[] {
        const names = this.roleTools.get(role)
        if (!names) return []
        return names.map((n) => this.tools.get(n)).filter((t): t is AnyTool => t !== undefined)
    }

    getToolDefinitions(role: DispatchableRole): ToolDefinition[] {
        const cached = this.definitionCache.get(role)
        if (cached) return cached

        const defs = this.getToolsForRole(role).map((tool) => ({
            type: 'function' as const,
            function: {
                name: tool.name,
                description: tool.description,
                parameters: { ...zodToJsonSchema(tool.parameters) },
            },
        }))

        this.definitionCache.set(role, defs)
        return defs
    }

    listAll(): AnyTool[] {
        return [...this.tools.values()]
    }
}
