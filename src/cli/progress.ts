import type { TypedEventEmitter } from '../core/events.js'
import type { DispatchableRole } from '../core/types.js'

const ROLE_LABELS: Record<DispatchableRole, string> = {
    orchestrator: 'Orchestrating...',
    research: 'Searching the web...',
    code: 'Writing code...',
    data: 'Analyzing data...',
    writing: 'Drafting...',
}

const TOOL_LABELS: Record<string, string> = {
    web_search: 'Searching the web...',
    write_to_buffer: 'Recording a claim...',
    write_to_canon: 'Promoting to Canon...',
    read_canon: 'Reading Canon...',
}

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    dispose(): void
}

export function createProgressTracker(eventBus: TypedEventEmitter, spinner: Spinner): ProgressTracker {
    let currentRole: DispatchableRole | null = null

    const onAgentStart = (data: { role: DispatchableRole }) => {
        currentRole = data.role
        spinner.message(ROLE_LABELS[data.role])
    }

    const onAgentComplete = (data: { role: DispatchableRole; duration: number }) => {
        const secs = (data.duration / 1000).toFixed(1)
        spinner.message(`${ROLE_LABELS[data.role].replace('...', '')} done (${secs}s)`)
        currentRole = null
    }

    const onDeclined = (data: { role: DispatchableRole; requestedDepth: number }) => {
        spinner.message(`Declined ${data.role} dispatch at depth ${data.requestedDepth}`)
    }

    const onToolBefore = (data: { toolName: string }) => {
        const label = TOOL_LABELS[data.toolName]
        if (label) spinner.message(label)
    }

    const onToolAfter = () => {
        if (currentRole) spinner.message(ROLE_LABELS[currentRole])
    }

    eventBus.on('agent:start', onAgentStart)
    eventBus.on('agent:complete', onAgentComplete)
    eventBus.on('dispatch:declined', onDeclined)
    eventBus.on('tool:before', onToolBefore)
    eventBus.on('tool:after', onToolAfter)

    return {
        dispose() {
            eventBus.off('agent:start', onAgentStart)
            eventBus.off('agent:complete', onAgentComplete)
            eventBus.off('dispatch:declined', onDeclined)
            eventBus.off('tool:before', onToolBefore)
            eventBus.off('tool:after', onToolAfter)
            currentRole = null
        },
    }
}
