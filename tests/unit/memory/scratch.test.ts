import { describe, expect, it } from 'vitest'
import { PermissionDeniedError } from '../../../src/core/errors.js'
import { ScratchLayer } from '../../../src/memory/scratch.js'
import { agent } from '../../helpers/fixtures.js'

describe('ScratchLayer', () => {
    const owner = agent('code', 'code-1')

    it('stores notes per agent and task', () => {
        const scratch = new ScratchLayer()
        scratch.write('code-1', 'task-1', 'first', owner)
        scratch.write('code-1', 'task-1', 'second', owner)

        expect(scratch.read('code-1', 'task-1', owner).map((n) => n.content)).toEqual(['first', 'second'])
    })

    it('refuses other agents, even in the same task', () => {
        const scratch = new ScratchLayer()
        scratch.write('code-1', 'task-1', 'secret', owner)

        const other = agent('code', 'code-2')
        expect(() => scratch.read('code-1', 'task-1', other)).toThrow(PermissionDeniedError)
        expect(() => scratch.write('code-1', 'task-1', 'x', other)).toThrow('Permission denied: scratch of code-1 is private')
    })

    it('refuses the orchestrator and the curator', () => {
        const scratch = new ScratchLayer()
        scratch.write('code-1', 'task-1', 'secret', owner)
        expect(() => scratch.read('code-1', 'task-1', agent('orchestrator', 'orchestrator-1'))).toThrow(PermissionDeniedError)
        expect(() => scratch.read('code-1', 'task-1', agent('curator', 'curator'))).toThrow(PermissionDeniedError)
    })

    it('clears one owner or a whole task', () => {
        const scratch = new ScratchLayer()
        scratch.write('code-1', 'task-1', 'a', owner)
        scratch.write('data-1', 'task-1', 'b', agent('data', 'data-1'))
        scratch.write('data-1', 'task-2', 'c', agent('data', 'data-1', 'task-2'))

        scratch.clear('code-1', 'task-1')
        expect(scratch.read('code-1', 'task-1', owner)).toEqual([])
        expect(scratch.size).toBe(2)

        scratch.clearTask('task-1')
        expect(scratch.size).toBe(1)
        expect(scratch.read('data-1', 'task-2', agent('data', 'data-1', 'task-2'))).toHaveLength(1)
    })
})
