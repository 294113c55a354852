import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'projectDir' | 'configDir' | 'memoryDir'> = {
    model: 'anthropic/claude-sonnet-4.5',
    baseURL: 'https://openrouter.ai/api/v1',
    temperature: 0,
    maxTokens: 4096,
    logLevel: 'info',
    tokenBudget: { target: 3000, hardCap: 4800 },
    agentTimeouts: {},
    maxTurns: 25,
    curation: {
        confidenceFloor: 0.6,
        agreementTolerance: 0,
        corroborationBonus: 0.1,
    },
    canonScopes: {
        orchestrator: '*',
        research: ['identity/', 'standards/', 'facts/'],
        code: ['identity/', 'standards/', 'decisions/'],
        data: ['identity/', 'standards/', 'facts/'],
        writing: ['identity/', 'standards/'],
    },
    search: { maxResults: 5 },
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/strata`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.strata'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
export const DEFAULT_MEMORY_DIR = `${LOCAL_CONFIG_DIR}/memory`
