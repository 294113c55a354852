import type { AgentRegistry } from '../agents/registry.js'
import { writeToBufferTool } from './memory/buffer.js'
import { readCanonTool, writeToCanonTool } from './memory/canon.js'
import { readScratchTool, writeToScratchTool } from './memory/scratch.js'
import { readTaskMemoryTool, writeToTaskMemoryTool } from './memory/task-memory.js'
import { ToolRegistry } from './registry.js'
import { webSearchTool } from './web/web-search.js'

export function createToolRegistry(agents: AgentRegistry): ToolRegistry {
    const registry = new ToolRegistry()

    registry.register(writeToBufferTool)
    registry.register(writeToScratchTool)
    registry.register(readScratchTool)
    registry.register(writeToTaskMemoryTool)
    registry.register(readTaskMemoryTool)
    registry.register(readCanonTool)
    registry.register(writeToCanonTool)
    registry.register(webSearchTool)

    for (const agent of agents.getAll()) {
        registry.registerForRole(agent.role, agent.allowedTools)
    }

    return registry
}
