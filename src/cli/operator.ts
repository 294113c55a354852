import type { Container } from '../core/container.js'
import type { Caller } from '../core/types.js'
import type { DisputeOutcome } from '../memory/types.js'
import { colors, formatCanonEntries, formatDispute, formatSummary } from './ui.js'

/** The human at the terminal acts with orchestrator rights over memory. */
export const OPERATOR: Caller = { agentId: 'operator', role: 'orchestrator' }

export function statusText(container: Container): string {
    return [
        `Model: ${container.config.model}`,
        `Memory: ${container.config.memoryDir}`,
        formatSummary(container.memory.summary()),
        '',
        container.metricsCollector.formatStatus(),
    ].join('\n')
}

export function canonText(container: Container, prefix?: string): string {
    const entries = Object.values(container.memory.readCanonSlice(undefined, OPERATOR))
        .filter((entry) => !prefix || entry.key.startsWith(prefix))
        .sort((a, b) => a.key.localeCompare(b.key))
    return formatCanonEntries(entries)
}

export function disputesText(container: Container, includeResolved = false): string {
    const disputes = container.memory.listDisputes(includeResolved ? {} : { status: 'open' }, OPERATOR)
    if (disputes.length === 0) return colors.dim(includeResolved ? 'No disputes' : 'No open disputes')
    return disputes.map(formatDispute).join('\n\n')
}

export async function resolveDispute(container: Container, id: string, outcome: DisputeOutcome, note?: string): Promise<string> {
    const resolved = await container.curator.resolveDispute(id, outcome, OPERATOR, note)
    const version = resolved.resolution?.canonVersion
    if (outcome === 'accept_claim' && version !== undefined) {
        return colors.success(`Dispute ${id} resolved: Canon '${resolved.canonKey}' is now at version ${version}`)
    }
    return colors.success(`Dispute ${id} resolved: Canon '${resolved.canonKey}' kept`)
}
