import { app } from '@azure/functions'
import { mcpDiscoverHandler } from '../handlers/mcpDiscover.js'
import { mcpInfoHandler } from '../handlers/mcpInfo.js'

app.http('McpDiscover', {
    route: 'mcp/discover',
    methods: ['GET'],
    authLevel: 'anonymous',
    handler: mcpDiscoverHandler
})

app.http('McpInfo', {
    route: 'mcp/info',
    methods: ['GET'],
    authLevel: 'anonymous',
    handler: mcpInfoHandler
})
