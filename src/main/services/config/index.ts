/**
 * Theme Service Configuration
 *
 * Priority (lowest to highest):
 * 1. Built-in defaults
 * 2. Overrides passed by the embedding process
 * 3. Environment variables
 */

// Types
export * from './types'

// Resolver
export { resolveServiceConfig, parseEnvOverrides } from './resolver'
