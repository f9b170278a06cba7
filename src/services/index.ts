// File: src/services/index.ts
// Export all services

// Parameter Store reads of the global-infrastructure namespace
export * from './ssm'

// Caller identity check run before a fresh collection
export * from './sts'

// Region launch announcement feed
export * from './feed'
