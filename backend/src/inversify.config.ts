/**
 * Production Inversify Container Configuration
 *
 * Tests use test/helpers/testInversify.config.ts instead.
 *
 * - Foundry settings missing: the null conversation runtime is bound and chat turns answer 503
 * - MCP_ENABLED_TOOLS selects the tool catalog once, at startup
 */
import { SystemClock, type IClock } from '@foundry-mcp-chat/shared'
import appInsights from 'applicationinsights'
import type { Container } from 'inversify'
import 'reflect-metadata'
import { agentProfileFromConfig, type AgentProfile } from './agents/agentProfile.js'
import { NullConversationRuntime, type IConversationRuntime } from './agents/conversationRuntime.js'
import { FoundryConversationRuntime } from './agents/foundryConversationRuntime.js'
import { loadFoundryConfig, type FoundryConfig } from './config/foundryConfig.js'
import {
    loadMcpGatewayConfig,
    loadSearchRepairConfig,
    parseEnabledTools,
    type McpGatewayConfig,
    type SearchRepairConfig
} from './config/mcpConfig.js'
import { loadRunOrchestratorConfig, type RunOrchestratorConfig } from './config/runOrchestratorConfig.js'
import { registerHandlers } from './di/registerHandlers.js'
import { registerCoreServices } from './di/registerServices.js'
import { TOKENS } from './di/tokens.js'
import { SdkMcpGatewayClient, type IMcpGatewayClient } from './mcp/mcpGatewayClient.js'
import { ToolCatalog, type IToolCatalog } from './mcp/toolCatalog.js'
import { GatewayCredentialProvider, type IGatewayCredentialProvider } from './secrets/gatewayCredentialProvider.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'

/**
 * In test mode (NODE_ENV=test), uses NullTelemetryClient to prevent hanging.
 */
export const setupContainer = async (container: Container, env: NodeJS.ProcessEnv = process.env): Promise<Container> => {
    const isTestMode = env.NODE_ENV === 'test'

    // CRITICAL: Never load real Application Insights in test mode (causes hanging)
    if (!isTestMode && env.APPLICATIONINSIGHTS_CONNECTION_STRING && appInsights.defaultClient) {
        // Already initialized in index.ts
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(appInsights.defaultClient)
    } else {
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).to(NullTelemetryClient).inSingletonScope()
    }
    container.bind<IClock>(TOKENS.Clock).toConstantValue(new SystemClock())

    // === Configuration ===
    const foundryConfig = loadFoundryConfig(env)
    container.bind<McpGatewayConfig>(TOKENS.McpGatewayConfig).toConstantValue(loadMcpGatewayConfig(env))
    container.bind<SearchRepairConfig>(TOKENS.SearchRepairConfig).toConstantValue(loadSearchRepairConfig(env))
    container.bind<RunOrchestratorConfig>(TOKENS.RunOrchestratorConfig).toConstantValue(loadRunOrchestratorConfig(env))
    container.bind<AgentProfile>(TOKENS.AgentProfile).toConstantValue(agentProfileFromConfig(foundryConfig))

    // === MCP ===
    container.bind<IToolCatalog>(TOKENS.ToolCatalog).toConstantValue(ToolCatalog.fromSelection(parseEnabledTools(env.MCP_ENABLED_TOOLS)))
    container.bind<IMcpGatewayClient>(TOKENS.McpGatewayClient).to(SdkMcpGatewayClient).inSingletonScope()
    container.bind<IGatewayCredentialProvider>(TOKENS.GatewayCredentialProvider).to(GatewayCredentialProvider).inSingletonScope()

    // === Conversation runtime ===
    if (foundryConfig) {
        container.bind<FoundryConfig>(TOKENS.FoundryConfig).toConstantValue(foundryConfig)
        container.bind<IConversationRuntime>(TOKENS.ConversationRuntime).to(FoundryConversationRuntime).inSingletonScope()
    } else {
        container.bind<IConversationRuntime>(TOKENS.ConversationRuntime).to(NullConversationRuntime).inSingletonScope()
    }

    registerCoreServices(container)
    registerHandlers(container)

    return container
}
