export * from './chatContracts.js'
