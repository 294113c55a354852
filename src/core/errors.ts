export type ErrorKind = 'transient' | 'permanent'

export type StrataErrorCode =
    | 'PERMISSION_DENIED'
    | 'DEPTH_EXCEEDED'
    | 'UNKNOWN_TASK'
    | 'SESSION_CLOSED'
    | 'STORAGE_FAILURE'
    | 'VERSION_CONFLICT'
    | 'INVALID_TRANSITION'
    | 'INFERENCE_FAILURE'
    | 'TIMEOUT'

export class StrataError extends Error {
    readonly kind: ErrorKind
    readonly code: StrataErrorCode

    constructor(message: string, code: StrataErrorCode, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'StrataError'
        this.code = code
        this.kind = kind
    }
}

export class PermissionDeniedError extends StrataError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'PERMISSION_DENIED', 'permanent', options)
        this.name = 'PermissionDeniedError'
    }
}

export class DepthExceededError extends StrataError {
    readonly requestedDepth: number

    constructor(requestedDepth: number, maxDepth: number) {
        super(`Dispatch depth ${requestedDepth} exceeds the limit of ${maxDepth}`, 'DEPTH_EXCEEDED', 'permanent')
        this.name = 'DepthExceededError'
        this.requestedDepth = requestedDepth
    }
}

export class UnknownTaskError extends StrataError {
    constructor(taskId: string) {
        super(`Unknown task '${taskId}'`, 'UNKNOWN_TASK', 'permanent')
        this.name = 'UnknownTaskError'
    }
}

export class SessionClosedError extends StrataError {
    constructor(taskId: string) {
        super(`Task session '${taskId}' is closed`, 'SESSION_CLOSED', 'permanent')
        this.name = 'SessionClosedError'
    }
}

export class StorageFailureError extends StrataError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'STORAGE_FAILURE', 'transient', options)
        this.name = 'StorageFailureError'
    }
}

/** A Canon write raced another writer; retry with a fresh conflict check. */
export class VersionConflictError extends StrataError {
    constructor(key: string, expected: number, actual: number) {
        super(`Canon '${key}' is at version ${actual}, expected ${expected}`, 'VERSION_CONFLICT', 'transient')
        this.name = 'VersionConflictError'
    }
}

export class InvalidTransitionError extends StrataError {
    constructor(message: string) {
        super(message, 'INVALID_TRANSITION', 'permanent')
        this.name = 'InvalidTransitionError'
    }
}

export class InferenceFailureError extends StrataError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'INFERENCE_FAILURE', 'permanent', options)
        this.name = 'InferenceFailureError'
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

function statusOf(error: object): number | undefined {
    if (!('status' in error)) return undefined
    return typeof error.status === 'number' ? error.status : undefined
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof StrataError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (typeof error === 'object' && error !== null) {
        const status = statusOf(error)
        if (status !== undefined) return classifyHttpError(status)
    }
    return 'permanent'
}
