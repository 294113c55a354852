import type { EventMap, TypedEventEmitter } from '../core/events.js'
import type { DispatchableRole } from '../core/types.js'

interface RoleMetrics {
    invocations: number
    totalDuration: number
    errors: number
    promptTokens: number
    completionTokens: number
    toolCalls: number
}

interface CurationTotals {
    sessions: number
    promoted: number
    dismissed: number
    disputed: number
    failed: number
}

export class MetricsCollector {
    private roles = new Map<DispatchableRole, RoleMetrics>()
    private sessionTokens = { prompt: 0, completion: 0 }
    private declined = 0
    private curation: CurationTotals = { sessions: 0, promoted: 0, dismissed: 0, disputed: 0, failed: 0 }
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        this.listen(eventBus, 'agent:start', ({ role }) => {
            this.metricsFor(role).invocations++
        })
        this.listen(eventBus, 'agent:complete', ({ role, duration }) => {
            this.metricsFor(role).totalDuration += duration
        })
        this.listen(eventBus, 'agent:error', ({ role }) => {
            this.metricsFor(role).errors++
        })
        this.listen(eventBus, 'token:usage', ({ role, prompt, completion }) => {
            const m = this.metricsFor(role)
            m.promptTokens += prompt
            m.completionTokens += completion
            this.sessionTokens.prompt += prompt
            this.sessionTokens.completion += completion
        })
        this.listen(eventBus, 'tool:after', ({ role }) => {
            this.metricsFor(role).toolCalls++
        })
        this.listen(eventBus, 'dispatch:declined', () => {
            this.declined++
        })
        this.listen(eventBus, 'session:close', ({ promoted, dismissed, disputed, failed }) => {
            this.curation.sessions++
            this.curation.promoted += promoted
            this.curation.dismissed += dismissed
            this.curation.disputed += disputed
            this.curation.failed += failed
        })
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    private listen<K extends keyof EventMap>(eventBus: TypedEventEmitter, event: K, handler: (data: EventMap[K]) => void): void {
        eventBus.on(event, handler)
        this.cleanups.push(() => eventBus.off(event, handler))
    }

    private metricsFor(role: DispatchableRole): RoleMetrics {
        let metrics = this.roles.get(role)
        if (!metrics) {
            metrics = { invocations: 0, totalDuration: 0, errors: 0, promptTokens: 0, completionTokens: 0, toolCalls: 0 }
            this.roles.set(role, metrics)
        }
        return metrics
    }

    getSessionTokens(): { prompt: number; completion: number; total: number } {
        return {
            ...this.sessionTokens,
            total: this.sessionTokens.prompt + this.sessionTokens.completion,
        }
    }

    getRoleMetrics(): Map<DispatchableRole, RoleMetrics> {
        return new Map(this.roles)
    }

    getDeclinedDispatches(): number {
        return this.declined
    }

    getCurationTotals(): CurationTotals {
        return { ...this.curation }
    }

    formatStatus(): string {
        const tokens = this.getSessionTokens()
        const lines: string[] = []
        lines.push(`Session tokens: ${tokens.total} (${tokens.prompt}p + ${tokens.completion}c)`)

        if (this.roles.size > 0) {
            lines.push('Agent metrics:')
            for (const [role, m] of this.roles) {
                lines.push(`  ${role}: ${m.invocations} calls, ${m.toolCalls} tools, ${m.errors} errors, ${m.promptTokens + m.completionTokens} tokens`)
            }
        }
        if (this.declined > 0) lines.push(`Declined dispatches: ${this.declined}`)
        if (this.curation.sessions > 0) {
            const c = this.curation
            lines.push(`Curation: ${c.promoted} promoted, ${c.dismissed} dismissed, ${c.disputed} disputed, ${c.failed} failed`)
        }

        return lines.join('\n')
    }
}
