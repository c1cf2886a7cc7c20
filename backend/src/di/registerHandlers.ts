import type { Container } from 'inversify'

import { HealthHandler } from '../handlers/health.js'
import { McpChatHandler } from '../handlers/mcpChat.js'
import { McpDiscoverHandler } from '../handlers/mcpDiscover.js'
import { McpInfoHandler } from '../handlers/mcpInfo.js'

export const HANDLER_CLASSES = [McpChatHandler, McpDiscoverHandler, McpInfoHandler, HealthHandler] as const

/**
 * Registers all HTTP handler classes.
 *
 * Handlers should be transient (default scope) to avoid shared mutable state.
 */
export function registerHandlers(container: Container): void {
    for (const Handler of HANDLER_CLASSES) {
        container.bind(Handler).toSelf()
    }
}
