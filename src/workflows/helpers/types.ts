// src/workflows/helpers/types.ts
import type { BatchEvent } from "../../models/batch";
import type { SettingsOverrides } from "../../services/config";
import type { DataLakeClientsService } from "../../storage/datalake";

/**
 * Options for a Promise-based batch run.
 *
 * Settings not given here are read from the CALL_ANALYTICS_* environment
 * variables; an explicit `apiKey` makes CALL_ANALYTICS_API_KEY optional.
 */
export interface AnalyzeCallsOptions {
	/** Cancels the run; it then resolves to an Aborted outcome */
	signal?: AbortSignal;
	onEvent?: (event: BatchEvent) => void;
	runId?: string;
	apiKey?: string;
	settings?: Omit<SettingsOverrides, "apiKey">;
	/**
	 * Storage client factory. Defaults to the Azure Data Lake SDK.
	 */
	storage?: DataLakeClientsService;
}
