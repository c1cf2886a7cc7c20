// Root barrel – intentionally concise. Grouped re-exports delegate to per-directory barrels.

export * from './chat/index.js'
export * from './domainModels.js'
export * from './exceptions/index.js'
export * from './mcp/index.js'
export * from './serviceConstants.js'
export * from './telemetryEvents.js'
export * from './time/index.js'
