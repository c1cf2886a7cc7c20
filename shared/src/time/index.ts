export * from './IClock.js'
