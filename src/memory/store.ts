import { StrataError, UnknownTaskError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Caller } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { DurableStorage } from '../storage/types.js'
import { BufferLayer } from './buffer.js'
import { type CanonDecision, CanonLayer } from './canon.js'
import { DisputeLayer, type DisputeOpen } from './disputes.js'
import { ScratchLayer } from './scratch.js'
import { type TaskMemoryAppend, TaskMemoryLayer } from './task-memory.js'
import type {
    BufferAppend,
    BufferFilter,
    BufferStatus,
    CanonEntry,
    CanonWrite,
    DisputeFilter,
    DisputeRecord,
    DisputeResolution,
    MemorySummary,
    ScratchNote,
    TaskMemory,
    TaskMemoryEntry,
    TentativeBufferEntry,
} from './types.js'

export interface MemoryStoreDeps {
    storage: DurableStorage
    logger: Logger
    eventBus?: TypedEventEmitter
}

const SYSTEM_CALLER: Caller = { agentId: 'system', role: 'curator' }

const SEED_ENTRIES: { key: string; value: string }[] = [
    {
        key: 'identity/system',
        value:
            'A hierarchy of agents: an Orchestrator delegating to Research (web search), Code, Data and Writing specialists. ' +
            'Dispatch depth is bounded at 3.',
    },
    {
        key: 'standards/memory_rules',
        value:
            'Canon is verified truth, written only by the Orchestrator and the Curator. ' +
            'Buffer holds unverified claims and is open to every agent. ' +
            'Scratch is private to one agent for one task. ' +
            'Task Memory is the shared narrative of the current task. ' +
            'Buffer claims are tentative until promoted.',
    },
]

/** Entry point to every memory layer. Each operation is checked by the access arbiter. */
export class MemoryStore {
    readonly canon: CanonLayer
    readonly buffer: BufferLayer
    readonly scratch: ScratchLayer
    readonly tasks: TaskMemoryLayer
    readonly disputes: DisputeLayer

    constructor(private deps: MemoryStoreDeps) {
        this.canon = new CanonLayer(deps)
        this.buffer = new BufferLayer(deps)
        this.scratch = new ScratchLayer()
        this.tasks = new TaskMemoryLayer(deps)
        this.disputes = new DisputeLayer(deps)
    }

    async load(): Promise<void> {
        await Promise.all([this.canon.load(), this.buffer.load(), this.tasks.load(), this.disputes.load()])
        this.deps.logger.debug(this.summary(), 'memory:loaded')
    }

    async seedIfEmpty(): Promise<void> {
        if (this.canon.size > 0) return
        for (const seed of SEED_ENTRIES) {
            await this.canon.transact(seed.key, SYSTEM_CALLER, (current) =>
                current ? { result: undefined } : { result: undefined, write: { value: seed.value, confidence: 1 } }
            )
        }
    }

    readCanonSlice(keys: Iterable<string> | undefined, caller: Caller): Record<string, CanonEntry> {
        return this.canon.readSlice(keys, caller)
    }

    writeCanon(input: CanonWrite, caller: Caller): Promise<CanonEntry> {
        return this.canon.write(input, caller)
    }

    transactCanon<T>(
        key: string,
        caller: Caller,
        decide: (current: CanonEntry | undefined) => CanonDecision<T> | Promise<CanonDecision<T>>
    ): Promise<{ result: T; entry?: CanonEntry }> {
        return this.canon.transact(key, caller, decide)
    }

    appendBuffer(input: BufferAppend, caller: Caller): Promise<TentativeBufferEntry> {
        return this.buffer.append(input, caller)
    }

    readBuffer(filter: BufferFilter, caller: Caller): TentativeBufferEntry[] {
        return this.buffer.read(filter, caller)
    }

    transitionBuffer(id: string, status: Exclude<BufferStatus, 'pending'>, caller: Caller): Promise<TentativeBufferEntry> {
        return this.buffer.transition(id, status, caller)
    }

    readScratch(agentId: string, taskId: string, caller: Caller): ScratchNote[] {
        return this.scratch.read(agentId, taskId, caller)
    }

    writeScratch(agentId: string, taskId: string, content: string, caller: Caller): ScratchNote {
        return this.scratch.write(agentId, taskId, content, caller)
    }

    clearScratch(agentId: string, taskId: string): void {
        this.scratch.clear(agentId, taskId)
    }

    openTaskMemory(taskId: string, prompt: string): Promise<TaskMemory> {
        return this.tasks.open(taskId, prompt)
    }

    appendTaskMemory(taskId: string, input: TaskMemoryAppend, caller: Caller): Promise<TaskMemoryEntry> {
        return this.tasks.append(taskId, input, caller)
    }

    readTaskMemory(taskId: string, caller: Caller): Readonly<TaskMemory> {
        return this.tasks.read(taskId, caller)
    }

    async archiveTaskMemory(taskId: string): Promise<Readonly<TaskMemory>> {
        const archived = await this.tasks.archive(taskId)
        this.scratch.clearTask(taskId)
        return archived
    }

    openDispute(input: DisputeOpen, caller: Caller): Promise<DisputeRecord> {
        return this.disputes.open(input, caller)
    }

    listDisputes(filter: DisputeFilter, caller: Caller): DisputeRecord[] {
        return this.disputes.list(filter, caller)
    }

    resolveDisputeRecord(
        id: string,
        resolution: Omit<DisputeResolution, 'resolvedAt' | 'canonVersion'>,
        caller: Caller,
        apply?: (record: DisputeRecord) => Promise<number | undefined>
    ): Promise<DisputeRecord> {
        return this.disputes.resolve(id, resolution, caller, apply)
    }

    viewFor(caller: Caller): AgentMemoryView {
        const { taskId } = caller
        if (!taskId) throw new UnknownTaskError('(none)')
        return new AgentMemoryView(this, { ...caller, taskId })
    }

    summary(): MemorySummary {
        const tasks = this.tasks.counts()
        const all = this.buffer.read({}, SYSTEM_CALLER)
        return {
            canonEntries: this.canon.size,
            bufferTotal: all.length,
            bufferPending: all.filter((entry) => entry.status === 'pending').length,
            openTasks: tasks.open,
            archivedTasks: tasks.archived,
            openDisputes: this.disputes.openCount,
        }
    }
}

/**
 * One agent's handle on memory, bound to its identity and task. Once revoked,
 * writes through the view fail so a dispatch that has ended cannot leave
 * anything behind.
 */
export class AgentMemoryView {
    private revoked = false

    constructor(
        private store: MemoryStore,
        readonly caller: Caller & { taskId: string }
    ) {}

    get taskId(): string {
        return this.caller.taskId
    }

    revoke(): void {
        this.revoked = true
    }

    private assertLive(): void {
        if (this.revoked) throw new StrataError(`Memory access for ${this.caller.agentId} has been revoked`, 'TIMEOUT', 'permanent')
    }

    readCanon(keys?: Iterable<string>): Record<string, CanonEntry> {
        return this.store.readCanonSlice(keys, this.caller)
    }

    async appendBuffer(input: Omit<BufferAppend, 'taskId'>): Promise<TentativeBufferEntry> {
        this.assertLive()
        return this.store.appendBuffer({ ...input, taskId: this.caller.taskId }, this.caller)
    }

    readBuffer(filter: Omit<BufferFilter, 'taskId'> = {}): TentativeBufferEntry[] {
        return this.store.readBuffer({ ...filter, taskId: this.caller.taskId }, this.caller)
    }

    writeScratch(content: string): ScratchNote {
        this.assertLive()
        return this.store.writeScratch(this.caller.agentId, this.caller.taskId, content, this.caller)
    }

    readScratch(): ScratchNote[] {
        return this.store.readScratch(this.caller.agentId, this.caller.taskId, this.caller)
    }

    async appendTaskMemory(content: string, label?: string): Promise<TaskMemoryEntry> {
        this.assertLive()
        return this.store.appendTaskMemory(this.caller.taskId, { content, label }, this.caller)
    }

    readTaskMemory(): Readonly<TaskMemory> {
        return this.store.readTaskMemory(this.caller.taskId, this.caller)
    }
}
