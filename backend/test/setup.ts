/**
 * Loaded before every test file: decorator metadata and test-mode telemetry.
 */
import 'reflect-metadata'

if (!process.env.NODE_ENV) {
    process.env.NODE_ENV = 'test'
}
