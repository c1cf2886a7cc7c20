export * from './agentExceptions.js'
