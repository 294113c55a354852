import * as clack from '@clack/prompts'
import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { createProgressTracker } from './progress.js'
import { handleSlashCommand } from './slash-commands.js'
import { banner, colors, formatCuration, formatError, formatOutcome } from './ui.js'

async function promptInput(): Promise<string | null> {
    const result = await clack.text({ message: '>', placeholder: 'Ask anything... (/help for commands)' })
    if (clack.isCancel(result)) return null
    return result
}

/** Each prompt runs as its own task session and is curated when it finishes. */
export async function runPrompt(container: Container, prompt: string): Promise<void> {
    const spinner = clack.spinner()
    spinner.start('Processing...')
    const progress = createProgressTracker(container.eventBus, spinner)
    try {
        const report = await container.sessions.runTask(prompt)
        spinner.stop(report.outcome.status === 'completed' ? 'Done' : 'Failed')
        console.log(formatOutcome(report.outcome))
        console.log(formatCuration(report.curation))
    } catch (error) {
        spinner.stop('Error')
        throw error
    } finally {
        progress.dispose()
    }
}

export async function startREPL(container: Container): Promise<void> {
    console.log(banner())
    console.log(colors.dim(`Model: ${container.config.model}`))
    console.log(colors.dim('Type /help for commands, /exit to quit\n'))

    while (true) {
        const input = await promptInput()
        const text = input?.trim()

        if (input === null || text === '/exit') {
            console.log(colors.dim('Goodbye!'))
            break
        }
        if (!text) continue

        try {
            if (text.startsWith('/')) {
                const result = await handleSlashCommand(text, container)
                console.log(result ?? formatError(`Unknown command: ${text}`))
                continue
            }
            await runPrompt(container, text)
        } catch (error) {
            console.log(formatError(errorMessage(error)))
        }
    }
}
