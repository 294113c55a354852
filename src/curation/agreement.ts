/**
 * Distance between two claims in [0, 1]; 0 means the claims say the same
 * thing. Claims agree when their distance is within the configured tolerance.
 */
export interface ClaimComparator {
    distance(a: unknown, b: unknown): number
}

export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim()
        .replace(/[.!?,;:]+$/, '')
}

function tokens(text: string): Set<string> {
    return new Set(text.split(' ').filter(Boolean))
}

export function textDistance(a: string, b: string): number {
    const left = normalizeText(a)
    const right = normalizeText(b)
    if (left === right) return 0

    const leftTokens = tokens(left)
    const rightTokens = tokens(right)
    let shared = 0
    for (const token of leftTokens) if (rightTokens.has(token)) shared++
    const union = leftTokens.size + rightTokens.size - shared
    return union === 0 ? 0 : 1 - shared / union
}

export function numericDistance(a: number, b: number): number {
    if (a === b) return 0
    return Math.min(1, Math.abs(a - b) / Math.max(Math.abs(a), Math.abs(b)))
}

/** JSON with object keys sorted, so structurally equal values serialize equally. */
export function stableStringify(value: unknown): string {
    if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`
    if (value !== null && typeof value === 'object') {
        const fields = Object.entries(value)
            .filter(([, field]) => field !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([key, field]) => `${JSON.stringify(key)}:${stableStringify(field)}`)
        return `{${fields.join(',')}}`
    }
    return JSON.stringify(value) ?? 'null'
}

export const defaultClaimComparator: ClaimComparator = {
    distance(a, b) {
        if (typeof a === 'number' && typeof b === 'number') return numericDistance(a, b)
        if (typeof a === 'string' && typeof b === 'string') return textDistance(a, b)
        return stableStringify(a) === stableStringify(b) ? 0 : 1
    },
}
