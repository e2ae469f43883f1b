/**
 * Core types for nps-sites
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
