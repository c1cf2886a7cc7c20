import { clamp, parseIntWithDefault } from './envParsing.js'

export const DEFAULT_POLL_INTERVAL_MS = 500
export const MIN_POLL_INTERVAL_MS = 200
export const MAX_POLL_INTERVAL_MS = 1000
export const DEFAULT_RUN_TIMEOUT_SECONDS = 120

export interface RunOrchestratorConfig {
    pollIntervalMs: number
    runTimeoutMs: number
}

export function loadRunOrchestratorConfig(env: NodeJS.ProcessEnv = process.env): RunOrchestratorConfig {
    const pollIntervalMs = clamp(
        parseIntWithDefault(env.AGENT_RUN_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
        MIN_POLL_INTERVAL_MS,
        MAX_POLL_INTERVAL_MS
    )
    const timeoutSeconds = Math.max(1, parseIntWithDefault(env.AGENT_RUN_TIMEOUT_SECONDS, DEFAULT_RUN_TIMEOUT_SECONDS))
    return { pollIntervalMs, runTimeoutMs: timeoutSeconds * 1000 }
}
