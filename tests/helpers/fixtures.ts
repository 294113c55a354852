import pino from 'pino'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import type { ResolvedConfig } from '../../src/config/schema.js'
import { type Container, createContainer } from '../../src/core/container.js'
import { StorageFailureError } from '../../src/core/errors.js'
import { TypedEventEmitter } from '../../src/core/events.js'
import type { Caller } from '../../src/core/types.js'
import type { LLMClient } from '../../src/llm/types.js'
import { MemoryStore } from '../../src/memory/store.js'
import type { SearchOptions, SearchProvider, SearchResult } from '../../src/search/types.js'
import { MemoryStorage } from '../../src/storage/memory-storage.js'
import type { CollectionName, DurableStorage, LogName, VersionedRecord } from '../../src/storage/types.js'

export const silentLogger = pino({ level: 'silent' })

export function testConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
    return {
        ...DEFAULT_CONFIG,
        apiKey: 'test-key',
        projectDir: '/tmp/strata-test',
        configDir: '/tmp/strata-test/config',
        memoryDir: '/tmp/strata-test/.strata/memory',
        logLevel: 'silent',
        ...overrides,
    }
}

export function createTestMemory(storage: DurableStorage = new MemoryStorage()) {
    const eventBus = new TypedEventEmitter()
    const memory = new MemoryStore({ storage, logger: silentLogger, eventBus })
    return { memory, storage, eventBus }
}

export const CURATOR: Caller = { agentId: 'curator', role: 'curator', taskId: 'task-1' }

export function agent(role: Caller['role'], agentId: string, taskId = 'task-1'): Caller {
    return { agentId, role, taskId }
}

type Operation = 'append' | 'readLog' | 'readCollection' | 'compareAndSwap'

/** Wraps a storage and fails chosen operations on demand. */
export class FlakyStorage implements DurableStorage {
    private failures: { op: Operation; target?: string; remaining: number }[] = []

    constructor(readonly inner: DurableStorage = new MemoryStorage()) {}

    failNext(op: Operation, times = 1, target?: string): void {
        this.failures.push({ op, target, remaining: times })
    }

    private maybeFail(op: Operation, target: string): void {
        const failure = this.failures.find((f) => f.op === op && f.remaining > 0 && (f.target === undefined || f.target === target))
        if (!failure) return
        failure.remaining--
        throw new StorageFailureError(`Injected ${op} failure on ${target}`)
    }

    async append(log: LogName, record: unknown): Promise<void> {
        this.maybeFail('append', log)
        return this.inner.append(log, record)
    }

    async readLog(log: LogName): Promise<unknown[]> {
        this.maybeFail('readLog', log)
        return this.inner.readLog(log)
    }

    async readCollection(name: CollectionName): Promise<Record<string, unknown>> {
        this.maybeFail('readCollection', name)
        return this.inner.readCollection(name)
    }

    async compareAndSwap(name: CollectionName, key: string, expectedVersion: number, record: VersionedRecord): Promise<boolean> {
        this.maybeFail('compareAndSwap', name)
        return this.inner.compareAndSwap(name, key, expectedVersion, record)
    }
}

export class FakeSearchProvider implements SearchProvider {
    readonly name = 'fake'
    readonly queries: string[] = []

    constructor(private results: SearchResult[] = []) {}

    async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
        this.queries.push(query)
        return this.results.slice(0, options.maxResults)
    }
}

export interface TestContainerOptions {
    config?: Partial<ResolvedConfig>
    storage?: DurableStorage
    search?: SearchProvider
}

export async function createTestContainer(llmClient: LLMClient, options: TestContainerOptions = {}): Promise<Container> {
    const container = createContainer(testConfig(options.config), {
        logger: silentLogger,
        storage: options.storage ?? new MemoryStorage(),
        llmClient,
        search: options.search ?? new FakeSearchProvider(),
    })
    await container.initialize()
    return container
}
