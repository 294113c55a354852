import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { type Container, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { canonText, disputesText, resolveDispute, statusText } from './operator.js'
import { runPrompt, startREPL } from './repl.js'
import { formatError } from './ui.js'

interface GlobalOptions {
    model?: string
    key?: string
    memoryDir?: string
    debug?: boolean
}

async function withContainer(options: GlobalOptions, action: (container: Container) => Promise<void>): Promise<void> {
    const fs = new NodeFileSystem()
    const cliFlags: Partial<Config> = {
        model: options.model,
        apiKey: options.key,
        memoryDir: options.memoryDir,
        logLevel: options.debug ? 'debug' : undefined,
    }
    const config = await loadConfig({ fs, cliFlags })
    const container = createContainer(config, { fs })
    try {
        await container.initialize()
        await action(container)
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
    } finally {
        await container.shutdown()
    }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('strata')
        .description('Multi-agent task runner over layered, curated memory')
        .version('0.1.0')
        .option('-p, --prompt <text>', 'Run a single prompt as one task session')
        .option('-m, --model <model>', 'LLM model to use')
        .option('-k, --key <key>', 'API key for the OpenAI-compatible endpoint')
        .option('--memory-dir <dir>', 'Directory holding the durable memory logs')
        .option('--debug', 'Enable debug logging')
        .action(async (options: GlobalOptions & { prompt?: string }) => {
            await withContainer(options, async (container) => {
                if (!container.config.apiKey) {
                    throw new Error('No API key configured. Pass --key or set STRATA_API_KEY.')
                }
                if (options.prompt) {
                    await runPrompt(container, options.prompt)
                } else {
                    await startREPL(container)
                }
            })
        })

    program
        .command('status')
        .description('Show a summary of every memory layer')
        .action(async () => {
            await withContainer(program.opts<GlobalOptions>(), async (container) => {
                console.log(statusText(container))
            })
        })

    program
        .command('canon [prefix]')
        .description('List Canon entries, optionally under a key prefix')
        .action(async (prefix?: string) => {
            await withContainer(program.opts<GlobalOptions>(), async (container) => {
                console.log(canonText(container, prefix))
            })
        })

    program
        .command('disputes')
        .description('List disputes awaiting review')
        .option('-a, --all', 'Include resolved disputes')
        .action(async (options: { all?: boolean }) => {
            await withContainer(program.opts<GlobalOptions>(), async (container) => {
                console.log(disputesText(container, options.all ?? false))
            })
        })

    program
        .command('resolve <id>')
        .description('Resolve a dispute')
        .option('--accept', 'Write the incoming claim to Canon as a new version')
        .option('--keep', 'Keep the current Canon value')
        .option('--note <text>', 'Note recorded with the resolution')
        .action(async (id: string, options: { accept?: boolean; keep?: boolean; note?: string }) => {
            await withContainer(program.opts<GlobalOptions>(), async (container) => {
                if (Boolean(options.accept) === Boolean(options.keep)) {
                    throw new Error('Pass exactly one of --accept or --keep')
                }
                console.log(await resolveDispute(container, id, options.accept ? 'accept_claim' : 'keep_canon', options.note))
            })
        })

    return program
}
