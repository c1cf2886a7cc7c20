export * from './toolTypes.js'
