/**
 * Per-key mutual exclusion built on promise chaining. Callers holding
 * different keys never wait on each other.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>()

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve()
        let release: () => void = () => {}
        const current = new Promise<void>((resolve) => {
            release = resolve
        })
        const tail = previous.then(() => current)
        this.tails.set(key, tail)

        await previous
        try {
            return await fn()
        } finally {
            release()
            if (this.tails.get(key) === tail) {
                this.tails.delete(key)
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key)
    }
}
