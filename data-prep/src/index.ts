/**
 * @statsheet-archive/data-prep - season statsheet harvest pipeline
 */

export type { Logger, RecordCategory, DaySummary, SeasonSummary } from './types.js';

export {
	HarvestError,
	ArgumentError,
	ConfigError,
	TransportError,
	DecodeError,
	FilesystemError,
	CancelledError,
	describeError,
} from './errors.js';

export { DEFAULT_CONFIG, HarvestConfigSchema, resolveConfig } from './config.js';
export type { HarvestConfig } from './config.js';

export { createLimiter, runTaskGroup } from './concurrency.js';
export type { Limiter, GroupTask, Spawn } from './concurrency.js';

export { HttpClient } from './http-client.js';
export type { FetchLike, HttpClientOptions, JsonResponse, QueryParams } from './http-client.js';

export { BatchFetcher, BATCH_ENDPOINTS } from './batch-fetcher.js';
export type { BatchEndpoint, EndpointRecord } from './batch-fetcher.js';

export { RecordWriter } from './record-writer.js';
export type { RecordWriterOptions } from './record-writer.js';

export { DayPipeline } from './day-pipeline.js';
export type { DayPipelineOptions } from './day-pipeline.js';

export { SeasonOrchestrator, parseSeason } from './season-orchestrator.js';
export type { SeasonOrchestratorOptions } from './season-orchestrator.js';

export { main } from './cli.js';
