// src/index.ts
export type { Address, AddressInput, InfraResult, ProviderId, QueryResponse, Technology } from './core/types.js'
export { createAddress, createInfraResult, errorResult, parseTechnology, TECHNOLOGIES } from './core/types.js'
export { ConfigError, UpstreamError, ValidationError } from './core/errors.js'
export type { Config, Credentials } from './core/config.js'
export { loadConfig, resolveCredentials } from './core/config.js'
export { InfraOrchestrator, buildProviders, runProviders } from './core/orchestrator.js'
export type { OrchestratorSettings } from './core/orchestrator.js'
export { buildOrchestrator } from './core/orchestrator-factory.js'
export type { MetricsSink, MetricRecord, ProviderStats } from './core/metrics.js'
export { SqliteMetrics } from './core/metrics.js'
export type { Provider } from './providers/base.js'
export { MockProvider } from './providers/mock.js'
export { WiradiusProvider, DEFAULT_FIELD_ALIASES } from './providers/wiradius.js'
export type { FieldAliases, WiradiusOptions } from './providers/wiradius.js'
export { DirectoryProvider, PORTAL_LINKS } from './providers/directory.js'
export type { ResultFormatter } from './results/base.js'
export { JsonFormatter } from './results/json.js'
export { MarkdownFormatter } from './results/markdown.js'
