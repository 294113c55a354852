import { describe, expect, it, vi } from 'vitest'
import { StorageFailureError } from '../../../src/core/errors.js'
import { CircuitBreaker, CircuitOpenError, withRetry } from '../../../src/llm/retry.js'

const FAST = { maxRetries: 2, baseDelay: 1, maxDelay: 5 }

function httpError(status: number): Error {
    return Object.assign(new Error(`HTTP ${status}`), { status })
}

describe('withRetry', () => {
    it('retries transient failures with growing delays', async () => {
        const fn = vi.fn<() => Promise<string>>()
        fn.mockRejectedValueOnce(httpError(503)).mockRejectedValueOnce(httpError(429)).mockResolvedValueOnce('ok')
        const delays: number[] = []

        const result = await withRetry(fn, { ...FAST, onRetry: (_attempt, delay) => delays.push(delay) })

        expect(result).toBe('ok')
        expect(fn).toHaveBeenCalledTimes(3)
        expect(delays).toEqual([1, 2])
    })

    it('gives up after the last retry', async () => {
        const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new StorageFailureError('still down'))
        await expect(withRetry(fn, FAST)).rejects.toThrow('still down')
        expect(fn).toHaveBeenCalledTimes(3)
    })

    it('does not retry permanent failures', async () => {
        const fn = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(400))
        await expect(withRetry(fn, FAST)).rejects.toThrow('HTTP 400')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('stops waiting when aborted', async () => {
        const controller = new AbortController()
        const fn = vi.fn<() => Promise<string>>().mockImplementation(async () => {
            controller.abort(new Error('cancelled'))
            throw httpError(503)
        })

        await expect(withRetry(fn, { ...FAST, signal: controller.signal })).rejects.toThrow('HTTP 503')
        expect(fn).toHaveBeenCalledTimes(1)
    })
})

describe('CircuitBreaker', () => {
    it('opens after consecutive failures and rejects until the cooldown passes', async () => {
        let now = 0
        const breaker = new CircuitBreaker(2, 1000, () => now)
        const failing = () => Promise.reject(new Error('down'))

        await expect(breaker.execute(failing)).rejects.toThrow('down')
        await expect(breaker.execute(failing)).rejects.toThrow('down')
        expect(breaker.getState()).toBe('open')
        await expect(breaker.execute(async () => 'x')).rejects.toBeInstanceOf(CircuitOpenError)

        now = 1001
        await expect(breaker.execute(async () => 'back')).resolves.toBe('back')
        expect(breaker.getState()).toBe('closed')
    })

    it('reopens when the trial call fails', async () => {
        let now = 0
        const breaker = new CircuitBreaker(1, 100, () => now)
        await expect(breaker.execute(() => Promise.reject(new Error('down')))).rejects.toThrow('down')

        now = 200
        await expect(breaker.execute(() => Promise.reject(new Error('still down')))).rejects.toThrow('still down')
        expect(breaker.getState()).toBe('open')
    })

    it('does not count aborts against the endpoint', async () => {
        const breaker = new CircuitBreaker(1, 100)
        await expect(breaker.execute(() => Promise.reject(new DOMException('stop', 'AbortError')))).rejects.toThrow('stop')
        expect(breaker.getState()).toBe('closed')
    })
})
