/**
 * Barrel export for all shared types.
 */
export { ACCESSION_NAMESPACES, PUBLICATION_NAMESPACES } from './accession.js';
export type { AccessionNamespace, AccessionRef, AccessionRecord } from './accession.js';
export { ResolutionStatus } from './resolution.js';
export type {
    GoalType,
    ResolutionRequest,
    RewriteRule,
    Strategy,
    AdapterFailure,
    AdapterFailureKind,
    AttemptOutcome,
    SuccessOutcome,
    RetryableFailureOutcome,
    TerminalFailureOutcome,
    SettledOutcome,
    StrategyAttempt,
    ResolutionResult,
} from './resolution.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    SRAgentConfig,
    SRAgentConfigInput,
    LogLevel,
    AggregationPolicy,
    OutputFormat,
    EntrezConfig,
    WebSearchConfig,
    RetryConfig,
    AggregationConfig,
    CacheConfig,
    RunRecord,
} from './config.js';
export type { LookupAdapter, LookupAdapterOptions, LookupResult } from './lookup-adapter.js';
