import { afterEach, describe, expect, it, vi } from 'vitest'
import type { Container } from '../../../src/core/container.js'
import { SessionClosedError, UnknownTaskError } from '../../../src/core/errors.js'
import { agent, CURATOR, createTestContainer, FlakyStorage } from '../../helpers/fixtures.js'
import { makeScriptedResponse, makeToolCall, makeToolCallResponse, ScriptedLLMClient, type ScriptedResponse } from '../../helpers/scripted-llm-client.js'

let container: Container | undefined

async function setup(script: ScriptedResponse[], storage?: FlakyStorage) {
    const c = await createTestContainer(new ScriptedLLMClient(script), { storage })
    container = c
    return c
}

afterEach(async () => {
    await container?.shutdown()
    container = undefined
})

describe('SessionManager', () => {
    it('opens, runs, curates and archives a task', async () => {
        const { sessions, memory } = await setup([
            makeToolCallResponse([makeToolCall('write_to_buffer', { key: 'facts/sky', claim: 'blue', confidence: 0.9 })]),
            makeScriptedResponse('The sky is blue'),
        ])

        const session = await sessions.open('What colour is the sky?', 'task-1')
        const outcome = await session.run()
        const report = await session.close()

        expect(outcome).toMatchObject({ status: 'completed', output: 'The sky is blue' })
        expect(report.curation.canonWrites).toEqual([{ key: 'facts/sky', version: 1 }])
        expect(report.taskMemory).toMatchObject({ taskId: 'task-1', prompt: 'What colour is the sky?', status: 'archived' })
        expect(report.dispatches.map((d) => d.state)).toEqual(['completed'])
        expect(session.status).toBe('closed')
        expect(memory.readCanonSlice(['facts/sky'], CURATOR)['facts/sky']?.value).toBe('blue')
    })

    it('returns the open session for a repeated open', async () => {
        const { sessions } = await setup([])
        const first = await sessions.open('p', 'task-1')
        expect(await sessions.open('p', 'task-1')).toBe(first)
        expect(sessions.get('task-1')).toBe(first)
    })

    it('refuses a closed task', async () => {
        const { sessions } = await setup([makeScriptedResponse('done')])
        const session = await sessions.open('p', 'task-1')
        await session.close()

        await expect(session.run()).rejects.toThrow(SessionClosedError)
        await expect(sessions.open('p', 'task-1')).rejects.toThrow(SessionClosedError)
        await expect(sessions.run('task-1')).rejects.toThrow(SessionClosedError)
    })

    it('reports an unknown task', async () => {
        const { sessions } = await setup([])
        expect(() => sessions.get('nope')).toThrow(UnknownTaskError)
    })

    it('shares one close between callers', async () => {
        const { sessions } = await setup([])
        const session = await sessions.open('p', 'task-1')
        const [a, b] = await Promise.all([session.close(), sessions.close('task-1')])
        expect(a).toBe(b)
    })

    it('waits for running dispatches before curating', async () => {
        const { sessions } = await setup([{ ...makeScriptedResponse('slow answer'), delayMs: 30 }])
        const session = await sessions.open('p', 'task-1')

        const running = session.run()
        const report = await session.close()

        expect((await running).status).toBe('completed')
        expect(report.dispatches.map((d) => d.state)).toEqual(['completed'])
        expect(report.taskMemory.entries.map((e) => e.content)).toEqual(['slow answer'])
    })

    it('freezes Task Memory once closed', async () => {
        const { sessions, memory } = await setup([])
        await sessions.open('p', 'task-1')
        await sessions.close('task-1')

        const frozen = memory.readTaskMemory('task-1', CURATOR)
        expect(Object.isFrozen(frozen)).toBe(true)
        expect(memory.readTaskMemory('task-1', CURATOR)).toBe(frozen)
        await expect(memory.appendTaskMemory('task-1', { content: 'late' }, agent('research', 'research-1'))).rejects.toThrow(
            SessionClosedError
        )
    })

    it('lets a close that failed on storage be retried', async () => {
        const storage = new FlakyStorage()
        const { sessions } = await setup([], storage)
        const session = await sessions.open('p', 'task-1')

        storage.failNext('append', 1, 'task-memory')
        await expect(session.close()).rejects.toThrow('Injected append failure on task-memory')
        expect(session.status).toBe('closing')

        const report = await session.close()
        expect(report.taskMemory.status).toBe('archived')
        expect(session.status).toBe('closed')
    })

    it('runs a one-shot task and announces the close', async () => {
        const { sessions, eventBus } = await setup([makeScriptedResponse('answer')])
        const closed: number[] = []
        eventBus.on('session:close', (e) => closed.push(e.promoted))

        const report = await sessions.runTask('quick question')

        expect(report.outcome.output).toBe('answer')
        expect(report.taskMemory.status).toBe('archived')
        expect(closed).toEqual([0])
    })

    it('rethrows the run error when the close that follows also fails', async () => {
        const c = await setup([])
        vi.spyOn(c.router, 'dispatch').mockRejectedValue(new Error('router broke'))
        vi.spyOn(c.curator, 'curateTask').mockRejectedValue(new Error('curation broke'))

        await expect(c.sessions.runTask('doomed')).rejects.toThrow('router broke')
    })

    it('closes every open session on shutdown', async () => {
        const c = await setup([])
        const session = await c.sessions.open('p', 'task-1')
        await c.shutdown()
        container = undefined
        expect(session.status).toBe('closed')
    })
})
