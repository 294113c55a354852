import pc from 'picocolors'
import type { CurationReport } from '../curation/curator.js'
import type { DispatchOutcome } from '../dispatch/types.js'
import type { CanonEntry, DisputeRecord, MemorySummary } from '../memory/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    agent: (name: string) => pc.cyan(`[${name}]`),
    tool: (name: string) => pc.blue(`${name}`),
}

export function banner(): string {
    return `${colors.brand('Strata')} ${colors.dim('v0.1.0')} layered-memory agents`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatTokenUsage(prompt: number, completion: number): string {
    const total = prompt + completion
    return colors.dim(`tokens: ${total} (${prompt}p + ${completion}c)`)
}

function render(value: unknown): string {
    return typeof value === 'string' ? value : JSON.stringify(value)
}

export function formatOutcome(outcome: DispatchOutcome): string {
    const lines: string[] = []
    if (outcome.status === 'completed') {
        lines.push(outcome.output)
        if (outcome.partialFailure) lines.push(colors.warn('Some sub-dispatches failed; the answer may be incomplete.'))
    } else {
        lines.push(formatError(`${outcome.role} ${outcome.status}: ${outcome.error?.message ?? outcome.output}`))
    }
    lines.push(formatTokenUsage(outcome.tokenUsage.prompt, outcome.tokenUsage.completion))
    return lines.join('\n')
}

export function formatCuration(report: CurationReport): string {
    const parts = [
        `${report.promoted.length} promoted`,
        `${report.dismissed.length} dismissed`,
        `${report.disputed.length} disputed`,
    ]
    if (report.failed.length > 0) parts.push(colors.error(`${report.failed.length} failed`))
    return colors.dim(`curation: ${parts.join(', ')}`)
}

export function formatDispute(dispute: DisputeRecord): string {
    const head = `${colors.bold(dispute.id)} ${dispute.canonKey} ${colors.dim(`[${dispute.status}]`)}`
    const lines = [
        head,
        `  canon v${dispute.existingCanonVersion}: ${render(dispute.existingValue)}`,
        `  incoming (${dispute.incomingConfidence.toFixed(2)}): ${render(dispute.incomingClaim)}`,
        colors.dim(`  ${dispute.reason}`),
    ]
    if (dispute.resolution) {
        lines.push(colors.dim(`  resolved ${dispute.resolution.outcome} by ${dispute.resolution.resolvedBy}`))
    }
    return lines.join('\n')
}

export function formatCanonEntries(entries: CanonEntry[]): string {
    if (entries.length === 0) return colors.dim('Canon is empty')
    return entries
        .map((e) => `${colors.bold(e.key)} ${colors.dim(`v${e.version} (${e.confidence.toFixed(2)})`)} ${render(e.value)}`)
        .join('\n')
}

export function formatSummary(summary: MemorySummary): string {
    return [
        `Canon entries: ${summary.canonEntries}`,
        `Buffer: ${summary.bufferPending} pending of ${summary.bufferTotal}`,
        `Tasks: ${summary.openTasks} open, ${summary.archivedTasks} archived`,
        `Open disputes: ${summary.openDisputes}`,
    ].join('\n')
}
