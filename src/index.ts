// src/index.ts
/**
 * Call analytics batch client.
 *
 * Effect API: `runBatch` with the JobClient, DataLakeClients and
 * AnalyticsConfig services. Promise API: `analyzeCalls`.
 */

export { CallAnalyticsServer } from "./agent/mcp-server";
export type { ServerRuntime } from "./agent/mcp-server";
export type {
	BatchEvent,
	BatchRunOutcome,
	ResultFile,
	SkippedResult,
	UploadOutcome,
} from "./models/batch";
export * from "./models/errors";
export {
	AnalysisResult,
	Answer,
	buildJobParameters,
	buildQuestions,
	DEFAULT_MODEL,
	JOB_STATE_COMPLETED,
	JOB_STATE_FAILED,
	Question,
	QuestionType,
} from "./models/job";
export type {
	BatchRequest,
	JobHandle,
	NamedBlob,
	QuestionDraft,
} from "./models/job";
export { AnalyticsConfig, resolveSettings } from "./services/config";
export type { AnalyticsSettings, SettingsOverrides } from "./services/config";
export { JobClient, JobClientLive } from "./services/job";
export { isRetriable, runBatch } from "./services/orchestrator";
export type { RunBatchOptions } from "./services/orchestrator";
export { setEventSink } from "./services/telemetry";
export type { EventSink } from "./services/telemetry";
export {
	AzureDataLakeLayer,
	DataLakeClients,
} from "./storage/datalake";
export type { DataLakeClientsService } from "./storage/datalake";
export { parseLocation } from "./storage/locator";
export type { StorageLocation } from "./storage/locator";
export { analyzeCalls } from "./workflows/helpers/batch";
export type { AnalyzeCallsOptions } from "./workflows/helpers/types";
