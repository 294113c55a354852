export interface SearchResult {
    title: string
    snippet: string
    url: string
}

export interface SearchOptions {
    maxResults: number
    signal?: AbortSignal
}

export interface SearchProvider {
    readonly name: string
    search(query: string, options: SearchOptions): Promise<SearchResult[]>
}
