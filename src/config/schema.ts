import { z } from 'zod'
import type { CanonScope, DispatchableRole } from '../core/types.js'

const TimeoutSchema = z.object({
    default: z.number().positive().optional(),
    max: z.number().positive().optional(),
})

export const CanonScopeSchema = z.union([z.literal('*'), z.array(z.string())])

export const ConfigSchema = z.object({
    model: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().positive().optional(),
    logLevel: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
    memoryDir: z.string().optional(),
    tokenBudget: z
        .object({
            target: z.number().optional(),
            hardCap: z.number().optional(),
        })
        .optional(),
    agentTimeouts: z.record(TimeoutSchema).optional(),
    maxTurns: z.number().int().positive().optional(),
    curation: z
        .object({
            confidenceFloor: z.number().min(0).max(1).optional(),
            agreementTolerance: z.number().min(0).max(1).optional(),
            corroborationBonus: z.number().min(0).max(1).optional(),
        })
        .optional(),
    canonScopes: z.record(CanonScopeSchema).optional(),
    search: z
        .object({
            baseURL: z.string().url().optional(),
            maxResults: z.number().int().positive().optional(),
        })
        .optional(),
    costTier: z
        .object({
            light: z.string().optional(),
            standard: z.string().optional(),
            heavy: z.string().optional(),
        })
        .optional(),
    agentModels: z.record(z.string()).optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface CurationConfig {
    /** Entries whose corroborated score falls below this are dismissed. */
    confidenceFloor: number
    /** Maximum claim distance at which two claims count as agreeing. */
    agreementTolerance: number
    /** Added to an entry's score per additional independent agent asserting the same claim. */
    corroborationBonus: number
}

export interface ResolvedConfig {
    model: string
    apiKey: string
    baseURL: string
    temperature: number
    maxTokens: number
    logLevel: 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'
    memoryDir: string
    tokenBudget: { target: number; hardCap: number }
    agentTimeouts: Partial<Record<DispatchableRole, { default: number; max: number }>>
    maxTurns: number
    curation: CurationConfig
    canonScopes: Partial<Record<DispatchableRole, CanonScope>>
    search: { baseURL?: string; maxResults: number }
    costTier?: { light: string; standard: string; heavy: string }
    agentModels?: Partial<Record<DispatchableRole, string>>
    projectDir: string
    configDir: string
}
