// src/workflows/helpers/batch.ts

import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";

import type { BatchRunOutcome } from "../../models/batch";
import type { BatchRequest } from "../../models/job";
import { AnalyticsConfig } from "../../services/config";
import { JobClientLive } from "../../services/job";
import { runBatch } from "../../services/orchestrator";
import {
	azureDataLakeClients,
	DataLakeClients,
} from "../../storage/datalake";
import type { AnalyzeCallsOptions } from "./types";

/**
 * Batch helpers - async wrappers around the Effect orchestrator for callers
 * that don't use Effect.
 *
 * All run logic lives in services/orchestrator.ts; this module only builds
 * the layers and bridges to a Promise.
 */

// =============================================================================
// Public API
// =============================================================================

/**
 * Run one batch end to end.
 *
 * Resolves with the run's outcome, including when the job failed or the run
 * aborted. Rejects only when the configuration cannot be loaded (for example
 * no API key in the options or the environment).
 */
export async function analyzeCalls(
	request: BatchRequest,
	options: AnalyzeCallsOptions = {},
): Promise<BatchRunOutcome> {
	const config = AnalyticsConfig.fromEnvWith({
		...options.settings,
		...(options.apiKey !== undefined ? { apiKey: options.apiKey } : {}),
	});
	const layer = Layer.merge(
		JobClientLive.pipe(Layer.provideMerge(config)),
		Layer.succeed(DataLakeClients, options.storage ?? azureDataLakeClients),
	);

	return Effect.runPromise(
		Effect.provide(
			runBatch(request, {
				signal: options.signal,
				onEvent: options.onEvent,
				runId: options.runId,
			}),
			layer,
		),
	);
}
