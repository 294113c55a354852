import { describe, expect, it } from 'vitest'
import { NullSearchProvider, SearchHttpError, SearxngSearchProvider } from '../../../src/search/searxng.js'

function fakeFetch(status: number, body: unknown) {
    const requests: string[] = []
    const fn: typeof fetch = async (input) => {
        requests.push(input instanceof URL ? input.toString() : String(input))
        return new Response(JSON.stringify(body), { status, statusText: status === 200 ? 'OK' : 'Bad Gateway' })
    }
    return { fn, requests }
}

describe('SearxngSearchProvider', () => {
    it('queries the JSON endpoint and maps results', async () => {
        const { fn, requests } = fakeFetch(200, {
            results: [
                { title: 'One', content: 'first hit', url: 'https://example.test/1' },
                { url: 'https://example.test/2' },
                { title: 'Three', content: 'third', url: 'https://example.test/3' },
            ],
        })
        const provider = new SearxngSearchProvider('http://searx.local', fn)

        const results = await provider.search('tide tables', { maxResults: 2 })

        expect(requests).toEqual(['http://searx.local/search?q=tide+tables&format=json'])
        expect(results).toEqual([
            { title: 'One', snippet: 'first hit', url: 'https://example.test/1' },
            { title: '', snippet: '', url: 'https://example.test/2' },
        ])
    })

    it('raises on a failed response', async () => {
        const { fn } = fakeFetch(502, {})
        const provider = new SearxngSearchProvider('http://searx.local/', fn)
        await expect(provider.search('x', { maxResults: 1 })).rejects.toThrow(SearchHttpError)
    })

    it('rejects a body of the wrong shape', async () => {
        const { fn } = fakeFetch(200, { items: [] })
        const provider = new SearxngSearchProvider('http://searx.local', fn)
        await expect(provider.search('x', { maxResults: 1 })).rejects.toThrow()
    })
})

describe('NullSearchProvider', () => {
    it('finds nothing', async () => {
        expect(await new NullSearchProvider().search('anything', { maxResults: 3 })).toEqual([])
    })
})
