/**
 * Test Setup - loaded with --import before any test module.
 *
 * NODE_ENV must be set before src/instrumentation/opentelemetry.ts is imported,
 * so spans go to the in-memory exporter.
 */
import 'reflect-metadata'

if (!process.env.NODE_ENV) {
    process.env.NODE_ENV = 'test'
}
