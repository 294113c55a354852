export type SpanStatus = 'ok' | 'error'

export type SpanKind = 'session' | 'dispatch' | 'llm_call' | 'tool' | 'curation'

export interface Span {
    id: string
    kind: SpanKind
    name: string
    startTime: number
    endTime?: number
    status?: SpanStatus
    attributes: Record<string, unknown>
    children: Span[]
    end(): number
}

export interface Trace {
    id: string
    taskId: string
    rootSpan: Span
    startTime: number
    endTime?: number
}
