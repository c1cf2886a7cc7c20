/**
 * MCP gateway and tool catalog settings.
 *
 * - COPILOT_MCP_ENDPOINT: gateway URL (default: GitHub Copilot MCP)
 * - MCP_ENABLED_TOOLS: `*` or unset for all tools, a comma list for a subset, empty or `none` for no tools
 * - MCP_CALL_TIMEOUT_MS: per tool call timeout (default 30000, clamped 1000..120000)
 * - SEARCH_RECENCY_DAYS: window used when a repository search query has to be replaced (default 30)
 * - SEARCH_STRIPPED_SORT_TOKENS: comma list of sort-only tokens removed from search queries
 */
import { clamp, parseIntWithDefault, parseList } from './envParsing.js'

export const DEFAULT_MCP_ENDPOINT = 'https://api.githubcopilot.com/mcp/'
export const DEFAULT_MCP_CALL_TIMEOUT_MS = 30_000
export const DEFAULT_SEARCH_RECENCY_DAYS = 30
export const DEFAULT_STRIPPED_SORT_TOKENS: readonly string[] = ['sort:updated-desc', 'sort:updated-asc', 'sort:updated']

export type EnabledToolsSelection = { mode: 'all' } | { mode: 'list'; names: string[] }

export interface McpGatewayConfig {
    endpoint: string
    callTimeoutMs: number
}

export interface SearchRepairConfig {
    recencyDays: number
    strippedSortTokens: readonly string[]
}

export function parseEnabledTools(raw: string | undefined): EnabledToolsSelection {
    if (raw === undefined) return { mode: 'all' }
    const trimmed = raw.trim()
    if (trimmed === '*') return { mode: 'all' }
    if (trimmed === '' || trimmed.toLowerCase() === 'none') return { mode: 'list', names: [] }
    return { mode: 'list', names: parseList(trimmed) }
}

export function loadMcpGatewayConfig(env: NodeJS.ProcessEnv = process.env): McpGatewayConfig {
    return {
        endpoint: env.COPILOT_MCP_ENDPOINT?.trim() || DEFAULT_MCP_ENDPOINT,
        callTimeoutMs: clamp(parseIntWithDefault(env.MCP_CALL_TIMEOUT_MS, DEFAULT_MCP_CALL_TIMEOUT_MS), 1000, 120_000)
    }
}

export function loadSearchRepairConfig(env: NodeJS.ProcessEnv = process.env): SearchRepairConfig {
    const tokens = env.SEARCH_STRIPPED_SORT_TOKENS ? parseList(env.SEARCH_STRIPPED_SORT_TOKENS) : []
    return {
        recencyDays: Math.max(1, parseIntWithDefault(env.SEARCH_RECENCY_DAYS, DEFAULT_SEARCH_RECENCY_DAYS)),
        strippedSortTokens: tokens.length > 0 ? tokens : DEFAULT_STRIPPED_SORT_TOKENS
    }
}
