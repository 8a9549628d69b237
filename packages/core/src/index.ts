// Core types - shared by the publisher and its tests
export * from './types'

// Schemas for validation
export * from './schemas/publication'

// Case conversion utilities (snake_case → camelCase)
export * from './case-convert'
