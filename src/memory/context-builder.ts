import { PromptBuilder, type PromptManifest } from '../llm/prompt-builder.js'
import type { AgentMemoryView } from './store.js'
import type { CanonEntry, ScratchNote, TaskMemory, TentativeBufferEntry } from './types.js'

const PRIORITY = {
    canon: 30,
    buffer: 20,
    scratch: 10,
} as const

function render(value: unknown): string {
    return typeof value === 'string' ? value : JSON.stringify(value)
}

export function formatTaskMemory(task: Readonly<TaskMemory>): string {
    const lines = [`Task: ${task.prompt}`]
    for (const entry of task.entries) {
        const label = entry.label ? ` ${entry.label}` : ''
        lines.push(`- [${entry.role}${label}] ${entry.content}`)
    }
    return lines.join('\n')
}

export function formatCanon(slice: Record<string, CanonEntry>): string {
    return Object.values(slice)
        .map((entry) => `- ${entry.key} (v${entry.version}, confidence ${entry.confidence.toFixed(2)}): ${render(entry.value)}`)
        .join('\n')
}

export function formatBuffer(entries: readonly TentativeBufferEntry[]): string {
    return entries
        .map((entry) => `- TENTATIVE ${entry.key} [${entry.status}] from ${entry.role} (${entry.confidence.toFixed(2)}): ${render(entry.claim)}`)
        .join('\n')
}

export function formatScratch(notes: readonly ScratchNote[]): string {
    return notes.map((note) => `- ${note.content}`).join('\n')
}

/**
 * System prompt for one agent turn: its role instructions and task memory are
 * always kept; its canon slice, the task's tentative buffer and its own scratch
 * are dropped lowest priority first when over the hard cap.
 */
export function buildAgentContext(
    systemPrompt: string,
    view: AgentMemoryView,
    budget: { target: number; hardCap: number }
): { prompt: string; manifest: PromptManifest } {
    const builder = new PromptBuilder()

    builder.add('System', systemPrompt, { pinned: true })
    builder.add('Task Memory', formatTaskMemory(view.readTaskMemory()), { pinned: true })

    const canon = formatCanon(view.readCanon())
    if (canon) builder.add('Canon (verified)', canon, { priority: PRIORITY.canon })

    const buffer = formatBuffer(view.readBuffer())
    if (buffer) builder.add('Buffer (TENTATIVE, unverified)', buffer, { priority: PRIORITY.buffer })

    const scratch = formatScratch(view.readScratch())
    if (scratch) builder.add('Your Scratch', scratch, { priority: PRIORITY.scratch })

    return builder.buildWithManifest(budget)
}
