import { classifyError, isAbortError, StrataError } from '../core/errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
    signal?: AbortSignal
    onRetry?: (attempt: number, delay: number, error: unknown) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 1000,
    maxDelay: 60000,
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason)
            return
        }
        const onAbort = () => {
            clearTimeout(timer)
            reject(signal?.reason)
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, ms)
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}

/** Retries transient failures with exponential backoff; aborts and permanent errors surface at once. */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            const aborted = opts.signal?.aborted || isAbortError(error)
            if (aborted || classifyError(error) === 'permanent' || attempt >= opts.maxRetries) {
                throw error
            }
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            const jitter = delay * 0.1 * Math.random()
            opts.onRetry?.(attempt + 1, delay, error)
            await sleep(delay + jitter, opts.signal)
        }
    }
}

type CircuitState = 'closed' | 'open' | 'half_open'

export class CircuitOpenError extends StrataError {
    constructor() {
        super('Circuit breaker is open', 'INFERENCE_FAILURE', 'transient')
        this.name = 'CircuitOpenError'
    }
}

/** Stops calling a failing endpoint for `cooldownMs` after `threshold` consecutive failures. */
export class CircuitBreaker {
    private state: CircuitState = 'closed'
    private failures = 0
    private lastFailure = 0

    constructor(
        private threshold: number = 5,
        private cooldownMs: number = 30000,
        private now: () => number = Date.now
    ) {}

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (this.state === 'open') {
            if (this.now() - this.lastFailure > this.cooldownMs) {
                this.state = 'half_open'
            } else {
                throw new CircuitOpenError()
            }
        }

        try {
            const result = await fn()
            this.onSuccess()
            return result
        } catch (error) {
            // an agent timing out says nothing about the endpoint
            if (!isAbortError(error)) this.onFailure()
            throw error
        }
    }

    private onSuccess(): void {
        this.failures = 0
        this.state = 'closed'
    }

    private onFailure(): void {
        this.failures++
        this.lastFailure = this.now()
        if (this.state === 'half_open' || this.failures >= this.threshold) {
            this.state = 'open'
        }
    }

    getState(): CircuitState {
        return this.state
    }
}
