import { z } from 'zod'

const VersionedSchema = z.object({ version: z.number().int().nonnegative() })

export function storedVersion(record: unknown): number {
    const parsed = VersionedSchema.safeParse(record)
    return parsed.success ? parsed.data.version : 0
}
