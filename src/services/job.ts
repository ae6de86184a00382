// src/services/job.ts
import {
	Context,
	Data,
	Duration,
	Effect,
	Layer,
	Option,
	Redacted,
	Schema,
} from "effect";

import {
	formatParseError,
	JobInitError,
	JobStartError,
	StatusFetchError,
} from "../models/errors";
import {
	InitJobResponse,
	type JobHandle,
	type JobParameters,
	JobStatus,
} from "../models/job";
import { AnalyticsConfig } from "./config";

/**
 * Client for the call-analytics job API.
 *
 * Endpoints (relative to the configured base URL):
 * - POST job/init              202 -> { job_id, input_storage_path, output_storage_path }
 * - POST job                   200 -> start acknowledged
 * - GET  job/{job_id}/status   200 -> { job_state }
 *
 * Every request carries the API-Subscription-Key header. Requests are
 * bounded by the configured timeout and never retried here.
 */

// =============================================================================
// Constants
// =============================================================================

export const API_KEY_HEADER = "API-Subscription-Key";

// =============================================================================
// Service Interface
// =============================================================================

/**
 * Acknowledgement of POST /job: the raw response body
 */
export interface JobStartAck {
	readonly status: 200;
	readonly body: string;
}

interface JobClientService {
	/**
	 * Create a job and obtain its storage locations.
	 * Succeeds only on HTTP 202.
	 */
	readonly init: () => Effect.Effect<JobHandle, JobInitError>;

	/**
	 * Start a job whose inputs have been uploaded.
	 * Succeeds only on HTTP 200.
	 */
	readonly start: (
		handle: JobHandle,
		parameters: JobParameters,
	) => Effect.Effect<JobStartAck, JobStartError>;

	/**
	 * Current job state.
	 * Returns Option.none() when the endpoint answers with anything but 200;
	 * fails only when no usable answer arrived at all.
	 */
	readonly status: (
		jobId: string,
	) => Effect.Effect<Option.Option<JobStatus>, StatusFetchError>;
}

// =============================================================================
// Service Tag
// =============================================================================

/**
 * Effect Context tag for JobClientService
 */
export class JobClient extends Context.Tag("JobClient")<
	JobClient,
	JobClientService
>() {}

// =============================================================================
// Implementation Helpers
// =============================================================================

/**
 * The request never produced a response (network failure, timeout, abort)
 */
class RequestFailedError extends Data.TaggedError("RequestFailedError")<{
	readonly cause: string;
}> {}

interface HttpResponse {
	readonly status: number;
	readonly body: string;
}

/**
 * Resolve an endpoint path against the base URL.
 *
 * The path is relative and the base always ends in "/", so
 * "https://host/call-analytics" and "https://host/call-analytics/" both
 * resolve "job/init" to "https://host/call-analytics/job/init".
 */
export function endpointUrl(baseUrl: string, path: string): string {
	const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
	return new URL(path, base).toString();
}

// =============================================================================
// Implementation
// =============================================================================

export const makeJobClient: Effect.Effect<
	JobClientService,
	never,
	AnalyticsConfig
> = Effect.gen(function* () {
	const settings = yield* AnalyticsConfig;

	const send = (
		path: string,
		init: { readonly method: "GET" | "POST"; readonly json?: unknown },
	): Effect.Effect<HttpResponse, RequestFailedError> =>
		Effect.tryPromise({
			try: async (signal) => {
				const headers: Record<string, string> = {
					[API_KEY_HEADER]: Redacted.value(settings.apiKey),
				};
				if (init.json !== undefined) {
					headers["Content-Type"] = "application/json";
				}
				const response = await fetch(endpointUrl(settings.baseUrl, path), {
					method: init.method,
					headers,
					body: init.json === undefined ? undefined : JSON.stringify(init.json),
					signal,
				});
				return { status: response.status, body: await response.text() };
			},
			catch: (error) =>
				new RequestFailedError({
					cause: error instanceof Error ? error.message : String(error),
				}),
		}).pipe(
			Effect.timeoutFail({
				duration: settings.requestTimeout,
				onTimeout: () =>
					new RequestFailedError({
						cause: `timed out after ${Duration.format(settings.requestTimeout)}`,
					}),
			}),
		);

	return {
		init: () =>
			Effect.gen(function* () {
				const response = yield* send("job/init", { method: "POST" }).pipe(
					Effect.mapError((error) => new JobInitError({ body: error.cause })),
				);

				if (response.status !== 202) {
					return yield* Effect.fail(
						new JobInitError({ status: response.status, body: response.body }),
					);
				}

				const decoded = yield* Schema.decodeUnknown(
					Schema.parseJson(InitJobResponse),
				)(response.body).pipe(
					Effect.mapError(
						(parseError) =>
							new JobInitError({
								status: response.status,
								body: `Unexpected init response: ${formatParseError(parseError)}`,
							}),
					),
				);

				return {
					jobId: decoded.job_id,
					inputStoragePath: decoded.input_storage_path,
					outputStoragePath: decoded.output_storage_path,
				};
			}),

		start: (handle, parameters) =>
			Effect.gen(function* () {
				const response = yield* send("job", {
					method: "POST",
					json: { job_id: handle.jobId, job_parameters: parameters },
				}).pipe(
					Effect.mapError(
						(error) =>
							new JobStartError({ jobId: handle.jobId, body: error.cause }),
					),
				);

				if (response.status !== 200) {
					return yield* Effect.fail(
						new JobStartError({
							jobId: handle.jobId,
							status: response.status,
							body: response.body,
						}),
					);
				}

				return { status: 200 as const, body: response.body };
			}),

		status: (jobId) =>
			Effect.gen(function* () {
				const response = yield* send(
					`job/${encodeURIComponent(jobId)}/status`,
					{ method: "GET" },
				).pipe(
					Effect.mapError(
						(error) => new StatusFetchError({ jobId, cause: error.cause }),
					),
				);

				if (response.status !== 200) {
					return Option.none<JobStatus>();
				}

				const status = yield* Schema.decodeUnknown(Schema.parseJson(JobStatus))(
					response.body,
				).pipe(
					Effect.mapError(
						(parseError) =>
							new StatusFetchError({
								jobId,
								status: response.status,
								cause: `Unexpected status response: ${formatParseError(parseError)}`,
							}),
					),
				);

				return Option.some(status);
			}),
	};
});

/**
 * Layer for JobClient backed by fetch
 */
export const JobClientLive: Layer.Layer<JobClient, never, AnalyticsConfig> =
	Layer.effect(JobClient, makeJobClient);
