/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './common'
export * from './nearby'
export * from './site'
