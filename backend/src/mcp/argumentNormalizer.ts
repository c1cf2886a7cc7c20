/**
 * Argument normalizer: turns the raw argument text a model produced into JSON the gateway accepts.
 *
 * The only rewrite is on `search_repositories`: GitHub search rejects sort-only strings
 * such as `sort:updated-desc` as a query.
 */
import { InvalidArgumentsException, isJsonObject, isJsonValue, type IClock, type JsonValue } from '@foundry-mcp-chat/shared'
import { inject, injectable } from 'inversify'
import type { SearchRepairConfig } from '../config/mcpConfig.js'
import { TOKENS } from '../di/tokens.js'

export const SEARCH_REPOSITORIES_TOOL = 'search_repositories'

const DAY_MS = 24 * 60 * 60 * 1000

export type ArgumentRepair = 'none' | 'empty-arguments' | 'search-sort-stripped' | 'search-query-defaulted'

export interface NormalizationReport {
    arguments: JsonValue
    repair: ArgumentRepair
}

@injectable()
export class ArgumentNormalizer {
    private readonly strippedTokens: ReadonlySet<string>

    constructor(
        @inject(TOKENS.Clock) private readonly clock: IClock,
        @inject(TOKENS.SearchRepairConfig) private readonly config: SearchRepairConfig
    ) {
        this.strippedTokens = new Set(config.strippedSortTokens.map((token) => token.toLowerCase()))
    }

    /**
     * @throws InvalidArgumentsException when the raw arguments are not JSON
     */
    normalize(toolName: string, rawArguments: unknown): JsonValue {
        return this.normalizeWithReport(toolName, rawArguments).arguments
    }

    normalizeWithReport(toolName: string, rawArguments: unknown): NormalizationReport {
        const parsed = this.parse(toolName, rawArguments)
        if (toolName === SEARCH_REPOSITORIES_TOOL && (parsed === undefined || isJsonObject(parsed))) {
            return this.repairSearchQuery(parsed ?? {})
        }
        if (parsed === undefined) {
            return { arguments: {}, repair: 'empty-arguments' }
        }
        return { arguments: parsed, repair: 'none' }
    }

    /** Returns undefined for empty input. */
    private parse(toolName: string, rawArguments: unknown): JsonValue | undefined {
        if (rawArguments === undefined) {
            return undefined
        }
        if (typeof rawArguments !== 'string') {
            if (isJsonValue(rawArguments)) return rawArguments
            throw new InvalidArgumentsException(`Arguments for tool '${toolName}' are not JSON serializable`, toolName)
        }
        if (rawArguments.trim() === '') {
            return undefined
        }
        let parsed: unknown
        try {
            parsed = JSON.parse(rawArguments)
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error)
            throw new InvalidArgumentsException(`Invalid JSON arguments for tool '${toolName}': ${reason}`, toolName)
        }
        if (!isJsonValue(parsed)) {
            throw new InvalidArgumentsException(`Arguments for tool '${toolName}' are not JSON serializable`, toolName)
        }
        return parsed
    }

    private repairSearchQuery(args: { [key: string]: JsonValue }): NormalizationReport {
        const query = args.query
        if (query === undefined || query === null || (typeof query === 'string' && query.trim() === '')) {
            return { arguments: { ...args, query: this.recentlyPushedQualifier() }, repair: 'search-query-defaulted' }
        }
        if (typeof query !== 'string') {
            return { arguments: args, repair: 'none' }
        }

        const tokens = query.trim().split(/\s+/)
        const kept = tokens.filter((token) => !this.strippedTokens.has(token.toLowerCase()))
        if (kept.length === tokens.length) {
            return { arguments: args, repair: 'none' }
        }
        if (kept.length === 0) {
            return { arguments: { ...args, query: this.recentlyPushedQualifier() }, repair: 'search-query-defaulted' }
        }
        return { arguments: { ...args, query: kept.join(' ') }, repair: 'search-sort-stripped' }
    }

    private recentlyPushedQualifier(): string {
        const since = new Date(this.clock.now().getTime() - this.config.recencyDays * DAY_MS)
        return `pushed:>=${since.toISOString().slice(0, 10)}`
    }
}
