import type { AgentRegistry } from '../agents/registry.js'
import { AgentRunner } from '../agents/runner.js'
import { createAgentRegistry } from '../agents/setup.js'
import type { ResolvedConfig } from '../config/schema.js'
import { Curator } from '../curation/curator.js'
import { DispatchRouter } from '../dispatch/router.js'
import { createLLMClient } from '../llm/client.js'
import { ModelRouter } from '../llm/model-router.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { MemoryStore } from '../memory/store.js'
import { NullSearchProvider, SearxngSearchProvider } from '../search/searxng.js'
import type { SearchProvider } from '../search/types.js'
import { SessionManager } from '../session/manager.js'
import { FileStorage } from '../storage/file-storage.js'
import type { DurableStorage } from '../storage/types.js'
import { ToolExecutor } from '../tools/executor.js'
import type { ToolRegistry } from '../tools/registry.js'
import { createToolRegistry } from '../tools/setup.js'
import { MetricsCollector } from '../tracing/metrics.js'
import { Tracer } from '../tracing/tracer.js'
import { errorMessage, toError } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    tracer: Tracer
    fs: FileSystem
    storage: DurableStorage
    memory: MemoryStore
    curator: Curator
    search: SearchProvider
    llmClient: LLMClient
    toolRegistry: ToolRegistry
    toolExecutor: ToolExecutor
    agentRegistry: AgentRegistry
    agentRunner: AgentRunner
    router: DispatchRouter
    sessions: SessionManager
    metricsCollector: MetricsCollector
    initialize(): Promise<void>
    shutdown(): Promise<void>
}

/** Overrides used by tests to swap the model, the disk or the search backend. */
export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    storage?: DurableStorage
    llmClient?: LLMClient
    search?: SearchProvider
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const tracer = new Tracer(logger)
    const fs = overrides.fs ?? new NodeFileSystem()
    const storage = overrides.storage ?? new FileStorage(fs, config.memoryDir, logger)
    const memory = new MemoryStore({ storage, logger, eventBus })
    const curator = new Curator({ memory, config: config.curation, logger })
    const search =
        overrides.search ?? (config.search.baseURL ? new SearxngSearchProvider(config.search.baseURL) : new NullSearchProvider())
    const llmClient = overrides.llmClient ?? createLLMClient(config, logger)
    const modelRouter = new ModelRouter({
        default: config.model,
        agentModels: config.agentModels,
        costTier: config.costTier,
    })
    const agentRegistry = createAgentRegistry()
    const toolRegistry = createToolRegistry(agentRegistry)
    const toolExecutor = new ToolExecutor(toolRegistry, tracer)
    const agentRunner = new AgentRunner({
        llmClient,
        toolExecutor,
        toolRegistry,
        tracer,
        eventBus,
        modelRouter,
        curator,
        search,
        searchMaxResults: config.search.maxResults,
        tokenBudget: config.tokenBudget,
        maxTurns: config.maxTurns,
    })
    const router = new DispatchRouter({
        memory,
        runner: agentRunner,
        agents: agentRegistry,
        config,
        tracer,
        logger,
    })
    const sessions = new SessionManager({ router, memory, curator, tracer, eventBus, logger })
    const metricsCollector = new MetricsCollector(eventBus)

    return {
        config,
        logger,
        eventBus,
        tracer,
        fs,
        storage,
        memory,
        curator,
        search,
        llmClient,
        toolRegistry,
        toolExecutor,
        agentRegistry,
        agentRunner,
        router,
        sessions,
        metricsCollector,

        async initialize() {
            await memory.load()
            await memory.seedIfEmpty()
            logger.debug({ memoryDir: config.memoryDir, search: search.name }, 'container:ready')
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                await sessions.closeAll()
            } catch (e) {
                errors.push(toError(e))
            }
            try {
                metricsCollector.dispose()
            } catch (e) {
                errors.push(toError(e))
            }
            eventBus.removeAll()
            if (errors.length > 0) {
                logger.warn({ errors: errors.map(errorMessage) }, 'Errors during shutdown')
            }
        },
    }
}
