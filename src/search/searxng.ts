import { z } from 'zod'
import type { SearchOptions, SearchProvider, SearchResult } from './types.js'

const SearxngResponse = z.object({
    results: z.array(
        z.object({
            title: z.string().default(''),
            content: z.string().default(''),
            url: z.string(),
        })
    ),
})

const REQUEST_TIMEOUT_MS = 15000

export class SearchHttpError extends Error {
    constructor(readonly status: number, statusText: string) {
        super(`HTTP ${status}: ${statusText}`)
        this.name = 'SearchHttpError'
    }
}

/** Queries a SearXNG instance through its JSON output format. */
export class SearxngSearchProvider implements SearchProvider {
    readonly name = 'searxng'

    constructor(
        private baseURL: string,
        private fetchFn: typeof fetch = fetch
    ) {}

    async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
        const url = new URL('search', this.baseURL.endsWith('/') ? this.baseURL : `${this.baseURL}/`)
        url.searchParams.set('q', query)
        url.searchParams.set('format', 'json')

        const timeout = AbortSignal.timeout(REQUEST_TIMEOUT_MS)
        const response = await this.fetchFn(url, {
            headers: { Accept: 'application/json', 'User-Agent': 'strata/0.1 (research agent)' },
            signal: options.signal ? AbortSignal.any([options.signal, timeout]) : timeout,
        })

        if (!response.ok) {
            throw new SearchHttpError(response.status, response.statusText)
        }

        const parsed = SearxngResponse.parse(await response.json())
        return parsed.results.slice(0, options.maxResults).map((r) => ({ title: r.title, snippet: r.content, url: r.url }))
    }
}

export class NullSearchProvider implements SearchProvider {
    readonly name = 'none'

    async search(_query: string, _options: SearchOptions): Promise<SearchResult[]> {
        return []
    }
}
