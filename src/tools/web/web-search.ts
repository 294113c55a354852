import { z } from 'zod'
import type { Tool } from '../types.js'

const WebSearchInput = z.object({
    query: z.string().min(1).describe('Search query'),
    maxResults: z.number().int().min(1).max(10).optional().describe('Max results (default: 5)'),
})

type WebSearchInput = z.infer<typeof WebSearchInput>

export const webSearchTool: Tool<WebSearchInput, string> = {
    name: 'web_search',
    description:
        'Search the web for current information. Results are also logged to Task Memory; record claims you rely on with write_to_buffer.',
    parameters: WebSearchInput,
    requiredAccess: { layer: 'task', verb: 'append' },
    async execute(input, ctx) {
        const results = await ctx.search.search(input.query, {
            maxResults: input.maxResults ?? ctx.searchMaxResults,
            signal: ctx.signal,
        })

        if (results.length === 0) {
            await ctx.memory.appendTaskMemory(`No web results for "${input.query}"`, 'search')
            return `No web results found for "${input.query}"`
        }

        const lines = [`Web search results for "${input.query}":`]
        results.forEach((r, i) => {
            lines.push(`${i + 1}. ${r.title}`, `   URL: ${r.url}`, `   ${r.snippet}`)
        })
        const text = lines.join('\n')

        await ctx.memory.appendTaskMemory(text, 'search')
        return text
    },
}
