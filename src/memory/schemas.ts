import { z } from 'zod'

const RoleSchema = z.enum(['orchestrator', 'research', 'code', 'data', 'writing', 'curator'])

export const BufferStatusSchema = z.enum(['pending', 'promoted', 'dismissed', 'disputed'])

export const CanonEntrySchema = z.object({
    key: z.string(),
    value: z.unknown(),
    confidence: z.number().min(0).max(1),
    lastUpdatedBy: z.string(),
    version: z.number().int().positive(),
    updatedAt: z.string(),
    sourceEntryIds: z.array(z.string()).default([]),
})

export const BufferEntrySchema = z.object({
    id: z.string(),
    taskId: z.string(),
    agentId: z.string(),
    role: RoleSchema,
    key: z.string(),
    claim: z.unknown(),
    source: z.string(),
    confidence: z.number().min(0).max(1),
    timestamp: z.string(),
    status: BufferStatusSchema,
})

export const BufferRecordSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('entry'), entry: BufferEntrySchema }),
    z.object({ type: z.literal('status'), id: z.string(), status: BufferStatusSchema, at: z.string() }),
])

export type BufferRecord = z.infer<typeof BufferRecordSchema>

const TaskMemoryEntrySchema = z.object({
    agentId: z.string(),
    role: RoleSchema,
    label: z.string().optional(),
    content: z.string(),
    timestamp: z.string(),
})

export const TaskMemoryRecordSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('opened'), taskId: z.string(), prompt: z.string(), at: z.string() }),
    z.object({ type: z.literal('entry'), taskId: z.string(), entry: TaskMemoryEntrySchema }),
    z.object({ type: z.literal('archived'), taskId: z.string(), at: z.string() }),
])

export type TaskMemoryRecord = z.infer<typeof TaskMemoryRecordSchema>

const DisputeResolutionSchema = z.object({
    outcome: z.enum(['keep_canon', 'accept_claim']),
    resolvedBy: z.string(),
    note: z.string().optional(),
    resolvedAt: z.string(),
    canonVersion: z.number().int().positive().optional(),
})

export const DisputeRecordSchema = z.object({
    id: z.string(),
    taskId: z.string(),
    canonKey: z.string(),
    incomingClaim: z.unknown(),
    incomingConfidence: z.number(),
    bufferEntryIds: z.array(z.string()),
    existingCanonVersion: z.number().int().nonnegative(),
    existingValue: z.unknown(),
    reason: z.string(),
    status: z.enum(['open', 'resolved']),
    resolution: DisputeResolutionSchema.optional(),
    createdAt: z.string(),
})

export const DisputeLogRecordSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('opened'), dispute: DisputeRecordSchema }),
    z.object({ type: z.literal('resolved'), id: z.string(), resolution: DisputeResolutionSchema }),
])

export type DisputeLogRecord = z.infer<typeof DisputeLogRecordSchema>
