/**
 * Tool catalog: the fixed set of tools advertised to the agent for a run.
 *
 * Built once at container setup from MCP_ENABLED_TOOLS and never mutated afterwards.
 */
import type { McpDiscoveryDocument, ToolDefinition } from '@foundry-mcp-chat/shared'
import type { EnabledToolsSelection } from '../config/mcpConfig.js'
import { GITHUB_TOOL_DEFINITIONS } from './githubTools.js'

export interface IToolCatalog {
    readonly size: number
    /** Tools in insertion order */
    list(): readonly ToolDefinition[]
    get(name: string): ToolDefinition | undefined
    has(name: string): boolean
    names(): string[]
    toDiscoveryDocument(): McpDiscoveryDocument
}

function freezeDefinition(definition: ToolDefinition): ToolDefinition {
    const properties = Object.fromEntries(
        Object.entries(definition.parameters.properties).map(([key, property]) => [key, Object.freeze({ ...property })])
    )
    return Object.freeze({
        name: definition.name,
        description: definition.description,
        parameters: Object.freeze({
            type: definition.parameters.type,
            properties: Object.freeze(properties),
            required: Object.freeze([...definition.parameters.required])
        })
    })
}

export class ToolCatalog implements IToolCatalog {
    private readonly tools: ReadonlyMap<string, ToolDefinition>
    private readonly ordered: readonly ToolDefinition[]

    constructor(definitions: readonly ToolDefinition[]) {
        const tools = new Map<string, ToolDefinition>()
        for (const definition of definitions) {
            if (tools.has(definition.name)) {
                throw new Error(`Duplicate tool name '${definition.name}' in catalog`)
            }
            tools.set(definition.name, freezeDefinition(definition))
        }
        this.tools = tools
        this.ordered = Object.freeze([...tools.values()])
    }

    /**
     * Build the catalog for an enabled-tools selection.
     * Names in the selection that match no definition are ignored; catalog order follows `definitions`.
     */
    static fromSelection(selection: EnabledToolsSelection, definitions: readonly ToolDefinition[] = GITHUB_TOOL_DEFINITIONS): ToolCatalog {
        if (selection.mode === 'all') {
            return new ToolCatalog(definitions)
        }
        const wanted = new Set(selection.names)
        return new ToolCatalog(definitions.filter((definition) => wanted.has(definition.name)))
    }

    get size(): number {
        return this.tools.size
    }

    list(): readonly ToolDefinition[] {
        return this.ordered
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name)
    }

    has(name: string): boolean {
        return this.tools.has(name)
    }

    names(): string[] {
        return this.ordered.map((tool) => tool.name)
    }

    toDiscoveryDocument(): McpDiscoveryDocument {
        return {
            jsonrpc: '2.0',
            id: 1,
            result: {
                tools: this.ordered.map((tool) => ({
                    name: tool.name,
                    description: tool.description,
                    inputSchema: tool.parameters
                }))
            }
        }
    }
}
