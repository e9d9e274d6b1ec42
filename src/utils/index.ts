/**
 * Shared utilities
 */

export * from './filesystem'
export * from './exec'
export * from './name'
