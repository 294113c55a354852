import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { AGENT_TIMEOUTS, type CanonScope, type DispatchableRole, isDispatchableRole } from '../core/types.js'
import { CONFIG_DIR, DEFAULT_CONFIG, DEFAULT_MEMORY_DIR, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Record<string, unknown> = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                merged[key] = value
            }
        }
    }
    return ConfigSchema.parse(merged)
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.STRATA_API_KEY) config.apiKey = env.STRATA_API_KEY
    if (env.STRATA_MODEL) config.model = env.STRATA_MODEL
    if (env.STRATA_MEMORY_DIR) config.memoryDir = env.STRATA_MEMORY_DIR
    const level = ConfigSchema.shape.logLevel.safeParse(env.STRATA_LOG_LEVEL)
    if (level.success && level.data) config.logLevel = level.data
    return config
}

function pickRoles<T>(record: Record<string, T> | undefined): Partial<Record<DispatchableRole, T>> {
    const picked: Partial<Record<DispatchableRole, T>> = {}
    for (const [role, value] of Object.entries(record ?? {})) {
        if (isDispatchableRole(role)) picked[role] = value
    }
    return picked
}

function resolveTimeouts(merged: Config): ResolvedConfig['agentTimeouts'] {
    const resolved: ResolvedConfig['agentTimeouts'] = {}
    for (const [role, override] of Object.entries(pickRoles(merged.agentTimeouts))) {
        if (!isDispatchableRole(role)) continue
        const base = AGENT_TIMEOUTS[role]
        resolved[role] = { default: override.default ?? base.default, max: override.max ?? base.max }
    }
    return resolved
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), cliFlags)

    const canonScopes: Partial<Record<DispatchableRole, CanonScope>> = {
        ...DEFAULT_CONFIG.canonScopes,
        ...pickRoles(merged.canonScopes),
    }

    return {
        ...DEFAULT_CONFIG,
        model: merged.model ?? DEFAULT_CONFIG.model,
        baseURL: merged.baseURL ?? DEFAULT_CONFIG.baseURL,
        temperature: merged.temperature ?? DEFAULT_CONFIG.temperature,
        maxTokens: merged.maxTokens ?? DEFAULT_CONFIG.maxTokens,
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        maxTurns: merged.maxTurns ?? DEFAULT_CONFIG.maxTurns,
        apiKey: merged.apiKey ?? '',
        projectDir,
        configDir: CONFIG_DIR,
        memoryDir: path.resolve(projectDir, merged.memoryDir ?? DEFAULT_MEMORY_DIR),
        tokenBudget: {
            ...DEFAULT_CONFIG.tokenBudget,
            ...merged.tokenBudget,
        },
        agentTimeouts: resolveTimeouts(merged),
        curation: {
            ...DEFAULT_CONFIG.curation,
            ...merged.curation,
        },
        canonScopes,
        search: {
            ...DEFAULT_CONFIG.search,
            ...merged.search,
        },
        costTier:
            merged.costTier?.light && merged.costTier?.standard && merged.costTier?.heavy
                ? { light: merged.costTier.light, standard: merged.costTier.standard, heavy: merged.costTier.heavy }
                : undefined,
        agentModels: pickRoles(merged.agentModels),
    }
}
