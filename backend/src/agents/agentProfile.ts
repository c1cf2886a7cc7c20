import type { ToolDefinition } from '@foundry-mcp-chat/shared'
import { DEFAULT_AGENT_NAME, type FoundryConfig } from '../config/foundryConfig.js'

/** Name and instructions of the transient agent created for each turn. */
export interface AgentProfile {
    name: string
    /** Overrides the generated instructions when set */
    instructions?: string
}

export function agentProfileFromConfig(config: FoundryConfig | undefined): AgentProfile {
    return { name: config?.agentName ?? DEFAULT_AGENT_NAME, instructions: config?.instructions }
}

export function buildDefaultInstructions(tools: readonly ToolDefinition[]): string {
    return [
        'You are a helpful AI assistant powered by Azure AI Foundry with access to GitHub tools served over MCP (Model Context Protocol).',
        '',
        `Available tools: ${tools.map((tool) => tool.name).join(', ')}`,
        '',
        'When using tools:',
        '- Always provide accurate information based on tool responses',
        '- Cite sources when available',
        '- If a tool fails or returns no results, explain what happened and suggest alternatives',
        '',
        'Be helpful, concise, and accurate in your responses.'
    ].join('\n')
}
