import { app } from '@azure/functions'
import { healthHandler } from '../handlers/health.js'

app.http('Health', {
    route: 'health',
    methods: ['GET'],
    authLevel: 'anonymous',
    handler: healthHandler
})
