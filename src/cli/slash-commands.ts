import type { Container } from '../core/container.js'
import { canonText, disputesText, resolveDispute, statusText } from './operator.js'
import { colors } from './ui.js'

interface SlashCommand {
    name: string
    description: string
    handler: (container: Container, args: string) => Promise<string>
}

const RESOLVE_USAGE = 'Usage: /resolve <dispute-id> accept|keep [note]'

const commands: SlashCommand[] = [
    {
        name: '/help',
        description: 'Show help',
        handler: async () => {
            const lines = commands.map((c) => `  ${colors.bold(c.name.padEnd(12))} ${c.description}`)
            return `Available commands:\n${lines.join('\n')}`
        },
    },
    {
        name: '/status',
        description: 'Memory summary and agent metrics',
        handler: async (container) => statusText(container),
    },
    {
        name: '/agents',
        description: 'List agents and their tools',
        handler: async (container) => {
            const lines = container.agentRegistry
                .getAll()
                .map((a) => `  ${colors.agent(a.role)} tools: ${a.allowedTools.join(', ')}`)
            return `Agents:\n${lines.join('\n')}`
        },
    },
    {
        name: '/canon',
        description: 'Show Canon entries, optionally under a key prefix',
        handler: async (container, args) => canonText(container, args.trim() || undefined),
    },
    {
        name: '/disputes',
        description: "List open disputes ('/disputes all' includes resolved)",
        handler: async (container, args) => disputesText(container, args.trim() === 'all'),
    },
    {
        name: '/resolve',
        description: 'Resolve a dispute: accept the incoming claim or keep Canon',
        handler: async (container, args) => {
            const [id, choice, ...note] = args.trim().split(/\s+/)
            if (!id || (choice !== 'accept' && choice !== 'keep')) return RESOLVE_USAGE
            return resolveDispute(container, id, choice === 'accept' ? 'accept_claim' : 'keep_canon', note.join(' ') || undefined)
        },
    },
]

export async function handleSlashCommand(input: string, container: Container): Promise<string | null> {
    const [cmdName, ...rest] = input.trim().split(' ')
    const args = rest.join(' ')

    const cmd = commands.find((c) => c.name === cmdName)
    if (!cmd) return null

    return cmd.handler(container, args)
}
