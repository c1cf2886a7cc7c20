// Central service naming constant used by telemetry enrichment and the health endpoint.
export const SERVICE_BACKEND = 'foundry-chat-functions'
