import { describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js'
import { PermissionDeniedError } from '../../../src/core/errors.js'
import { Curator } from '../../../src/curation/curator.js'
import { agent, CURATOR, createTestMemory, FlakyStorage, silentLogger } from '../../helpers/fixtures.js'

async function setup(storage = new FlakyStorage()) {
    const { memory } = createTestMemory(storage)
    await memory.openTaskMemory('task-1', 'p')
    const curator = new Curator({ memory, config: DEFAULT_CONFIG.curation, logger: silentLogger })
    return { memory, curator, storage }
}

const research = agent('research', 'research-1')
const data = agent('data', 'data-1')
const orchestrator = agent('orchestrator', 'orchestrator-1')

describe('Curator.cluster', () => {
    it('groups agreeing claims per key and adds the corroboration bonus', async () => {
        const { memory, curator } = await setup()
        await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'Blue', confidence: 0.5 }, research)
        await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'blue.', confidence: 0.55 }, data)
        await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'red', confidence: 0.9 }, data)

        const clusters = curator.cluster(memory.readBuffer({ taskId: 'task-1' }, CURATOR))
        expect(clusters.map((c) => c.members.map((m) => m.entry.claim))).toEqual([['red'], ['blue.', 'Blue']])
        const scores = clusters.flatMap((c) => c.members.map((m) => m.score))
        expect(scores[0]).toBeCloseTo(0.9)
        expect(scores[1]).toBeCloseTo(0.65)
        expect(scores[2]).toBeCloseTo(0.6)
    })

    it('does not count one agent twice', async () => {
        const { memory, curator } = await setup()
        await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 1, confidence: 0.5 }, research)
        await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 1, confidence: 0.5 }, research)

        const [cluster] = curator.cluster(memory.readBuffer({ taskId: 'task-1' }, CURATOR))
        expect(cluster?.members.map((m) => m.score)).toEqual([0.5, 0.5])
    })
})

describe('Curator.curateTask', () => {
    it('promotes corroborated claims into a new Canon entry', async () => {
        const { memory, curator } = await setup()
        const a = await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'blue', confidence: 0.9 }, research)
        const b = await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'Blue.', confidence: 0.85 }, data)

        const report = await curator.curateTask('task-1')

        expect(report.promoted.sort()).toEqual([a.id, b.id].sort())
        expect(report.canonWrites).toEqual([{ key: 'X', version: 1 }])
        const entry = memory.readCanonSlice(['X'], CURATOR).X
        expect(entry).toMatchObject({ value: 'blue', version: 1 })
        expect(entry?.confidence).toBeCloseTo(1)
    })

    it('dismisses claims under the confidence floor', async () => {
        const { memory, curator } = await setup()
        const weak = await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'blue', confidence: 0.3 }, research)

        const report = await curator.curateTask('task-1')
        expect(report.dismissed).toEqual([weak.id])
        expect(memory.readCanonSlice(['X'], CURATOR)).toEqual({})
    })

    it('opens a dispute for a conflicting claim and leaves Canon unchanged', async () => {
        const { memory, curator } = await setup()
        await memory.writeCanon({ key: 'X', value: 'blue', confidence: 1, expectedVersion: 0 }, CURATOR)
        await memory.writeCanon({ key: 'X', value: 'navy', confidence: 1, expectedVersion: 1 }, CURATOR)
        const claim = await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'red', confidence: 0.95 }, research)

        const report = await curator.curateTask('task-1')

        expect(report.disputed).toEqual([claim.id])
        const [dispute] = memory.listDisputes({}, CURATOR)
        expect(dispute).toMatchObject({
            canonKey: 'X',
            existingCanonVersion: 2,
            existingValue: 'navy',
            incomingClaim: 'red',
            bufferEntryIds: [claim.id],
            reason: 'Claim from research conflicts with Canon v2',
        })
        expect(memory.readCanonSlice(['X'], CURATOR).X).toMatchObject({ value: 'navy', version: 2 })
    })

    it('changes nothing when run again', async () => {
        const { memory, curator, storage } = await setup()
        await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'blue', confidence: 0.9 }, research)
        await curator.curateTask('task-1')
        const before = {
            buffer: await storage.readLog('buffer'),
            history: await storage.readLog('canon-history'),
            disputes: await storage.readLog('disputes'),
        }

        const again = await curator.curateTask('task-1')

        expect(again).toMatchObject({ promoted: [], dismissed: [], disputed: [], failed: [], canonWrites: [] })
        expect(await storage.readLog('buffer')).toEqual(before.buffer)
        expect(await storage.readLog('canon-history')).toEqual(before.history)
        expect(await storage.readLog('disputes')).toEqual(before.disputes)
    })

    it('leaves entries pending on a storage failure and finishes them on the next run', async () => {
        const { memory, curator, storage } = await setup()
        const entry = await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'blue', confidence: 0.9 }, research)

        storage.failNext('compareAndSwap')
        const failed = await curator.curateTask('task-1')
        expect(failed.failed).toEqual([{ entryId: entry.id, error: 'Injected compareAndSwap failure on canon' }])
        expect(memory.buffer.get(entry.id)?.status).toBe('pending')

        const retried = await curator.curateTask('task-1')
        expect(retried.promoted).toEqual([entry.id])
        expect(memory.readCanonSlice(['X'], CURATOR).X?.version).toBe(1)
    })

    it('does not write Canon twice when only the status update failed', async () => {
        const { memory, curator, storage } = await setup()
        const entry = await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'blue', confidence: 0.9 }, research)

        storage.failNext('append', 1, 'buffer')
        const first = await curator.curateTask('task-1')
        expect(first.canonWrites).toEqual([{ key: 'X', version: 1 }])
        expect(first.failed.map((f) => f.entryId)).toEqual([entry.id])

        const second = await curator.curateTask('task-1')
        expect(second.canonWrites).toEqual([])
        expect(second.promoted).toEqual([entry.id])
        expect(memory.readCanonSlice(['X'], CURATOR).X?.version).toBe(1)
    })

    it('reuses the open dispute when a disputed claim is curated again', async () => {
        const { memory, curator, storage } = await setup()
        await memory.writeCanon({ key: 'X', value: 'blue', confidence: 1, expectedVersion: 0 }, CURATOR)
        await memory.appendBuffer({ taskId: 'task-1', key: 'X', claim: 'red', confidence: 0.9 }, research)

        storage.failNext('append', 1, 'buffer')
        await curator.curateTask('task-1')
        await curator.curateTask('task-1')

        expect(memory.listDisputes({}, CURATOR)).toHaveLength(1)
    })
})

describe('Curator.promoteClaim', () => {
    it('writes an orchestrator claim without the confidence floor', async () => {
        const { memory, curator } = await setup()
        const outcome = await curator.promoteClaim({ taskId: 'task-1', key: 'decisions/db', claim: 'sqlite', confidence: 0.4 }, orchestrator)

        expect(outcome.status).toBe('promoted')
        expect(memory.readCanonSlice(['decisions/db'], CURATOR)['decisions/db']).toMatchObject({ value: 'sqlite', version: 1 })
        expect(memory.readBuffer({ taskId: 'task-1' }, CURATOR).map((e) => [e.agentId, e.status])).toEqual([
            ['orchestrator-1', 'promoted'],
        ])
    })

    it('refuses specialists', async () => {
        const { curator } = await setup()
        await expect(curator.promoteClaim({ taskId: 'task-1', key: 'k', claim: 1, confidence: 1 }, research)).rejects.toThrow(
            PermissionDeniedError
        )
    })

    it('keeps one winner per version when promotions race', async () => {
        const { memory, curator } = await setup()
        const outcomes = await Promise.all(
            ['a', 'b', 'c'].map((claim) =>
                curator.promoteClaim({ taskId: 'task-1', key: 'race', claim, confidence: 0.9 }, orchestrator)
            )
        )

        expect(outcomes.map((o) => o.status)).toEqual(['promoted', 'disputed', 'disputed'])
        expect(memory.readCanonSlice(['race'], CURATOR).race).toMatchObject({ value: 'a', version: 1 })
        expect(memory.listDisputes({ status: 'open' }, CURATOR)).toHaveLength(2)
    })
})

describe('Curator.resolveDispute', () => {
    async function disputed() {
        const ctx = await setup()
        await ctx.memory.writeCanon({ key: 'X', value: 'blue', confidence: 1, expectedVersion: 0 }, CURATOR)
        const outcome = await ctx.curator.promoteClaim({ taskId: 'task-1', key: 'X', claim: 'red', confidence: 0.7 }, orchestrator)
        if (outcome.status !== 'disputed') throw new Error('expected a dispute')
        return { ...ctx, dispute: outcome.dispute }
    }

    it('installs the incoming claim as a new version when accepted', async () => {
        const { memory, curator, dispute } = await disputed()
        const resolved = await curator.resolveDispute(dispute.id, 'accept_claim', orchestrator, 'verified by hand')

        expect(resolved.resolution).toMatchObject({ outcome: 'accept_claim', canonVersion: 2, note: 'verified by hand' })
        expect(memory.readCanonSlice(['X'], CURATOR).X).toMatchObject({ value: 'red', version: 2, confidence: 0.7 })
    })

    it('installs an accepted claim once when recording the resolution has to be retried', async () => {
        const { memory, curator, storage, dispute } = await disputed()

        storage.failNext('append', 1, 'disputes')
        await expect(curator.resolveDispute(dispute.id, 'accept_claim', orchestrator)).rejects.toThrow(
            'Injected append failure on disputes'
        )
        expect(memory.disputes.get(dispute.id)?.status).toBe('open')

        const resolved = await curator.resolveDispute(dispute.id, 'accept_claim', orchestrator)
        expect(resolved.resolution?.canonVersion).toBe(2)
        expect((await memory.canon.history('X')).map((e) => [e.version, e.value])).toEqual([
            [1, 'blue'],
            [2, 'red'],
        ])
    })

    it('leaves Canon as it is when kept', async () => {
        const { memory, curator, dispute } = await disputed()
        const resolved = await curator.resolveDispute(dispute.id, 'keep_canon', orchestrator)

        expect(resolved.resolution?.canonVersion).toBeUndefined()
        expect(memory.readCanonSlice(['X'], CURATOR).X).toMatchObject({ value: 'blue', version: 1 })
    })
})
