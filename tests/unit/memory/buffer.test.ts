import { describe, expect, it } from 'vitest'
import { InvalidTransitionError, PermissionDeniedError } from '../../../src/core/errors.js'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { BufferLayer } from '../../../src/memory/buffer.js'
import { MemoryStorage } from '../../../src/storage/memory-storage.js'
import { agent, CURATOR, FlakyStorage, silentLogger } from '../../helpers/fixtures.js'

function createBuffer(storage: MemoryStorage | FlakyStorage = new MemoryStorage()) {
    const eventBus = new TypedEventEmitter()
    return { buffer: new BufferLayer({ storage, logger: silentLogger, eventBus }), storage, eventBus }
}

const research = agent('research', 'research-1')

describe('BufferLayer', () => {
    it('appends pending, tentative entries stamped with the caller', async () => {
        const { buffer } = createBuffer()
        const entry = await buffer.append({ taskId: 'task-1', key: 'X', claim: 'blue', confidence: 0.9 }, research)

        expect(entry).toMatchObject({
            taskId: 'task-1',
            agentId: 'research-1',
            role: 'research',
            key: 'X',
            claim: 'blue',
            confidence: 0.9,
            status: 'pending',
            tentative: true,
        })
        expect(Object.isFrozen(entry)).toBe(true)
    })

    it('clamps confidence into [0, 1]', async () => {
        const { buffer } = createBuffer()
        const high = await buffer.append({ taskId: 't', key: 'k', claim: 1, confidence: 3 }, research)
        const low = await buffer.append({ taskId: 't', key: 'k', claim: 1, confidence: -1 }, research)
        expect(high.confidence).toBe(1)
        expect(low.confidence).toBe(0)
    })

    it('emits an append event', async () => {
        const { buffer, eventBus } = createBuffer()
        const seen: string[] = []
        eventBus.on('memory:buffer-append', ({ key, role }) => seen.push(`${role}:${key}`))

        await buffer.append({ taskId: 't', key: 'k', claim: 1, confidence: 0.5 }, research)
        expect(seen).toEqual(['research:k'])
    })

    it('accepts concurrent appends without losing any', async () => {
        const { buffer } = createBuffer()
        await Promise.all(
            Array.from({ length: 20 }, (_, i) =>
                buffer.append({ taskId: 't', key: `k${i}`, claim: i, confidence: 0.5 }, agent('data', `data-${i}`, 't'))
            )
        )
        expect(buffer.read({ taskId: 't' }, CURATOR)).toHaveLength(20)
    })

    it('filters by task and status', async () => {
        const { buffer } = createBuffer()
        const a = await buffer.append({ taskId: 't1', key: 'k', claim: 1, confidence: 0.5 }, research)
        await buffer.append({ taskId: 't2', key: 'k', claim: 1, confidence: 0.5 }, research)
        await buffer.transition(a.id, 'dismissed', CURATOR)

        expect(buffer.read({ taskId: 't1', status: 'pending' }, CURATOR)).toEqual([])
        expect(buffer.read({ taskId: 't1', status: 'dismissed' }, CURATOR).map((e) => e.id)).toEqual([a.id])
        expect(buffer.read({ taskId: 't2' }, CURATOR)).toHaveLength(1)
    })

    it('moves status exactly once out of pending', async () => {
        const { buffer } = createBuffer()
        const entry = await buffer.append({ taskId: 't', key: 'k', claim: 1, confidence: 0.5 }, research)

        const promoted = await buffer.transition(entry.id, 'promoted', CURATOR)
        expect(promoted.status).toBe('promoted')

        await expect(buffer.transition(entry.id, 'dismissed', CURATOR)).rejects.toThrow(InvalidTransitionError)
        expect(buffer.get(entry.id)?.status).toBe('promoted')
    })

    it('lets only the curator transition entries', async () => {
        const { buffer } = createBuffer()
        const entry = await buffer.append({ taskId: 't', key: 'k', claim: 1, confidence: 0.5 }, research)
        await expect(buffer.transition(entry.id, 'promoted', agent('orchestrator', 'o'))).rejects.toThrow(PermissionDeniedError)
    })

    it('rejects transitions of unknown entries', async () => {
        const { buffer } = createBuffer()
        await expect(buffer.transition('nope', 'promoted', CURATOR)).rejects.toThrow("Unknown buffer entry 'nope'")
    })

    it('keeps an entry pending when the status record cannot be stored', async () => {
        const storage = new FlakyStorage()
        const { buffer } = createBuffer(storage)
        const entry = await buffer.append({ taskId: 't', key: 'k', claim: 1, confidence: 0.5 }, research)

        storage.failNext('append', 1, 'buffer')
        await expect(buffer.transition(entry.id, 'promoted', CURATOR)).rejects.toThrow('Injected append failure on buffer')
        expect(buffer.get(entry.id)?.status).toBe('pending')
    })

    it('replays entries and status changes on load', async () => {
        const storage = new MemoryStorage()
        const { buffer } = createBuffer(storage)
        const a = await buffer.append({ taskId: 't', key: 'k', claim: { v: 1 }, confidence: 0.5 }, research)
        const b = await buffer.append({ taskId: 't', key: 'k', claim: 2, confidence: 0.5 }, research)
        await buffer.transition(a.id, 'disputed', CURATOR)

        const reloaded = new BufferLayer({ storage, logger: silentLogger })
        await reloaded.load()

        expect(reloaded.get(a.id)).toMatchObject({ status: 'disputed', claim: { v: 1 } })
        expect(reloaded.get(b.id)?.status).toBe('pending')
    })

    it('ignores a replayed second transition', async () => {
        const storage = new MemoryStorage()
        const { buffer } = createBuffer(storage)
        const a = await buffer.append({ taskId: 't', key: 'k', claim: 1, confidence: 0.5 }, research)
        await buffer.transition(a.id, 'promoted', CURATOR)
        await storage.append('buffer', { type: 'status', id: a.id, status: 'dismissed', at: '2026-01-01T00:00:00.000Z' })

        const reloaded = new BufferLayer({ storage, logger: silentLogger })
        await reloaded.load()
        expect(reloaded.get(a.id)?.status).toBe('promoted')
    })
})
