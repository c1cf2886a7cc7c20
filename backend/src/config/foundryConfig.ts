/**
 * Azure AI Foundry project settings.
 *
 * Configuration (Environment Variables):
 * - FOUNDRY_PROJECT_ENDPOINT: Agents-compatible endpoint of the Foundry project (required)
 * - FOUNDRY_DEPLOYMENT_NAME: Model deployment the per-turn agent runs on (required)
 * - FOUNDRY_API_VERSION: API version (default: 2024-05-01-preview)
 * - FOUNDRY_AGENT_NAME: Display name of the transient agent (default: McpAgent)
 * - FOUNDRY_AGENT_INSTRUCTIONS: System instructions override
 *
 * When the endpoint or deployment is missing the container binds the null runtime
 * and chat turns answer 503.
 */

export const DEFAULT_FOUNDRY_API_VERSION = '2024-05-01-preview'
export const DEFAULT_AGENT_NAME = 'McpAgent'

export interface FoundryConfig {
    endpoint: string
    deploymentName: string
    apiVersion: string
    agentName: string
    instructions?: string
}

export function loadFoundryConfig(env: NodeJS.ProcessEnv = process.env): FoundryConfig | undefined {
    const endpoint = env.FOUNDRY_PROJECT_ENDPOINT?.trim()
    const deploymentName = env.FOUNDRY_DEPLOYMENT_NAME?.trim()
    if (!endpoint || !deploymentName) {
        return undefined
    }
    return {
        endpoint,
        deploymentName,
        apiVersion: env.FOUNDRY_API_VERSION?.trim() || DEFAULT_FOUNDRY_API_VERSION,
        agentName: env.FOUNDRY_AGENT_NAME?.trim() || DEFAULT_AGENT_NAME,
        instructions: env.FOUNDRY_AGENT_INSTRUCTIONS?.trim() || undefined
    }
}
