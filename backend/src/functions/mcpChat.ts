import { app } from '@azure/functions'
import { mcpChatHandler } from '../handlers/mcpChat.js'

app.http('McpChat', {
    route: 'chat/mcp',
    methods: ['POST'],
    authLevel: 'anonymous',
    handler: mcpChatHandler
})
