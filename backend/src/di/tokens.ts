/**
 * Centralized Inversify tokens (string identifiers).
 *
 * Keeping them in one place reduces drift and typos across container configs,
 * health checks, and @inject decorators.
 */
export const TOKENS = {
    // Core
    TelemetryClient: 'ITelemetryClient',
    Clock: 'IClock',

    // Configuration
    FoundryConfig: 'FoundryConfig',
    McpGatewayConfig: 'McpGatewayConfig',
    SearchRepairConfig: 'SearchRepairConfig',
    RunOrchestratorConfig: 'RunOrchestratorConfig',

    // MCP
    ToolCatalog: 'IToolCatalog',
    McpGatewayClient: 'IMcpGatewayClient',
    GatewayCredentialProvider: 'IGatewayCredentialProvider',

    // Agents
    ConversationRuntime: 'IConversationRuntime',
    AgentProfile: 'AgentProfile'
} as const
