// src/services/orchestrator.ts
import {
	Effect,
	Either,
	Option,
	Ref,
	Schema,
} from "effect";
import { nanoid } from "nanoid";

import type {
	BatchEvent,
	BatchRunOutcome,
	ResultFile,
	SkippedResult,
	UploadOutcome,
} from "../models/batch";
import {
	BatchCancelledError,
	type BatchError,
	type BatchPhase,
	formatParseError,
	InvalidRequestError,
	ResultParseError,
	StatusFetchError,
} from "../models/errors";
import {
	AnalysisResultFromJson,
	type BatchRequest,
	buildJobParameters,
	JOB_STATE_COMPLETED,
	JOB_STATE_FAILED,
	Question,
} from "../models/job";
import type { DataLakeClients } from "../storage/datalake";
import { parseLocation } from "../storage/locator";
import { AnalyticsConfig } from "./config";
import { JobClient } from "./job";
import { makeStorageClient } from "./storage";
import { BatchRunEventBuilder, emitEvent } from "./telemetry";

/**
 * Batch orchestration: one end-to-end job run.
 *
 *   Init -> Uploading -> Starting -> Polling -> Retrieving -> Completed
 *                                       |
 *                                       +-> Failed (job_state "Failed")
 *
 * Any phase can end in Aborted. Failures never escape as errors: every run
 * resolves to a BatchRunOutcome.
 *
 * Upload failures are recorded and the job is started anyway; the remote job
 * reports missing inputs itself. Polling checks are strictly sequential with a
 * fixed wait between them. A failed status fetch aborts the run once more than
 * `maxStatusFailures` happen in a row.
 */

// =============================================================================
// Types
// =============================================================================

export interface RunBatchOptions {
	/** Stops the run; in-flight requests are aborted */
	readonly signal?: AbortSignal;
	/**
	 * Progress callback, invoked synchronously from the run. If it throws, the
	 * run carries on and the failure is counted in the run's log event.
	 */
	readonly onEvent?: (event: BatchEvent) => void;
	/** Correlation id for logs; generated when omitted */
	readonly runId?: string;
}

/**
 * What the run has established so far; reported when it aborts
 */
interface RunState {
	readonly phase: BatchPhase;
	readonly jobId?: string;
	readonly uploads: ReadonlyArray<UploadOutcome>;
	readonly statusChecks: number;
}

type BatchServices = JobClient | DataLakeClients | AnalyticsConfig;

// =============================================================================
// Implementation Helpers
// =============================================================================

const RESULT_FILE_SUFFIX = ".json";

/**
 * Reject requests that cannot produce a meaningful job, before any I/O
 */
export function validateRequest(
	request: BatchRequest,
): Effect.Effect<void, InvalidRequestError> {
	const fail = (reason: string) =>
		Effect.fail(new InvalidRequestError({ reason }));

	if (request.files.length === 0) {
		return fail("at least one file is required");
	}

	const names = new Set<string>();
	for (const file of request.files) {
		if (!file.name || file.name.includes("/")) {
			return fail(`invalid file name "${file.name}"`);
		}
		if (names.has(file.name)) {
			return fail(`duplicate file name "${file.name}"`);
		}
		names.add(file.name);
	}

	if (!Number.isInteger(request.numSpeakers) || request.numSpeakers < 1) {
		return fail("numSpeakers must be a positive integer");
	}

	const ids = new Set<string>();
	for (const question of request.questions) {
		const decoded = Schema.decodeUnknownEither(Question)(question);
		if (Either.isLeft(decoded)) {
			return fail(`invalid question: ${formatParseError(decoded.left)}`);
		}
		if (ids.has(question.id)) {
			return fail(`duplicate question id "${question.id}"`);
		}
		ids.add(question.id);
	}

	return Effect.void;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode a downloaded result file
 */
export function parseResultFile(
	fileName: string,
	content: Uint8Array,
): Effect.Effect<ResultFile, ResultParseError> {
	return Effect.gen(function* () {
		const text = yield* Effect.try({
			try: () => utf8.decode(content),
			catch: () => new ResultParseError({ fileName, cause: "not valid UTF-8" }),
		});
		const result = yield* Schema.decodeUnknown(AnalysisResultFromJson)(text).pipe(
			Effect.mapError(
				(parseError) =>
					new ResultParseError({ fileName, cause: formatParseError(parseError) }),
			),
		);
		return { fileName, result };
	});
}

/**
 * Completes when the signal fires; never completes without one
 */
function awaitAbort(signal: AbortSignal | undefined): Effect.Effect<void> {
	if (signal === undefined) {
		return Effect.never;
	}
	return Effect.async<void>((resume) => {
		if (signal.aborted) {
			resume(Effect.void);
			return;
		}
		const onAbort = () => resume(Effect.void);
		signal.addEventListener("abort", onAbort, { once: true });
		return Effect.sync(() => signal.removeEventListener("abort", onAbort));
	});
}

/**
 * Errors worth retrying the whole run for
 */
export function isRetriable(error: BatchError): boolean {
	switch (error._tag) {
		case "StatusFetchError":
		case "TransportError":
			return true;
		case "JobInitError":
		case "JobStartError":
			return error.status === undefined || error.status >= 500;
		default:
			return false;
	}
}

// =============================================================================
// Orchestration
// =============================================================================

/**
 * Run one batch end to end.
 *
 * Emits one "batch.run" wide event when the run ends.
 */
export const runBatch = (
	request: BatchRequest,
	options: RunBatchOptions = {},
): Effect.Effect<BatchRunOutcome, never, BatchServices> =>
	Effect.gen(function* () {
		const settings = yield* AnalyticsConfig;
		const jobs = yield* JobClient;

		const runId = options.runId ?? nanoid();
		const telemetry = new BatchRunEventBuilder(runId);
		const state = yield* Ref.make<RunState>({
			phase: "Init",
			uploads: [],
			statusChecks: 0,
		});

		let eventHandlerFailures = 0;
		const notify = (event: BatchEvent) =>
			Effect.try({
				try: () => options.onEvent?.(event),
				catch: (error) => (error instanceof Error ? error.message : String(error)),
			}).pipe(
				Effect.catchAll((message) =>
					Effect.sync(() => {
						eventHandlerFailures++;
						telemetry
							.setCount("eventHandlerFailures", eventHandlerFailures)
							.setMetadata({ eventHandlerError: message });
					}),
				),
			);

		const enterPhase = (phase: BatchPhase) =>
			Effect.gen(function* () {
				yield* Ref.update(state, (s) => ({ ...s, phase }));
				telemetry.enterPhase(phase);
				yield* notify({ type: "phase", phase });
			});

		const aborted = (error: BatchError) =>
			Effect.map(
				Ref.get(state),
				(s): BatchRunOutcome => ({
					_tag: "Aborted",
					runId,
					phase: s.phase,
					error,
					...(s.jobId !== undefined ? { jobId: s.jobId } : {}),
					uploads: s.uploads,
				}),
			);

		/**
		 * Poll until the job reaches a terminal state; returns that state
		 */
		const pollUntilTerminal = (jobId: string) =>
			Effect.gen(function* () {
				let consecutiveFailures = 0;

				while (true) {
					const fetched = yield* Effect.either(jobs.status(jobId));
					const s = yield* Ref.updateAndGet(state, (current) => ({
						...current,
						statusChecks: current.statusChecks + 1,
					}));

					if (Either.isRight(fetched) && Option.isSome(fetched.right)) {
						consecutiveFailures = 0;
						const jobState = fetched.right.value.job_state;
						yield* notify({ type: "status", jobState, check: s.statusChecks });

						if (jobState === JOB_STATE_COMPLETED || jobState === JOB_STATE_FAILED) {
							return jobState;
						}
					} else {
						consecutiveFailures++;
						const error = Either.isLeft(fetched)
							? fetched.left
							: new StatusFetchError({
									jobId,
									cause: "status endpoint did not return a job state",
								});
						yield* notify({
							type: "status_unavailable",
							error,
							consecutiveFailures,
						});

						if (consecutiveFailures > settings.maxStatusFailures) {
							return yield* Effect.fail(error);
						}
					}

					yield* notify({ type: "waiting", interval: settings.pollInterval });
					yield* Effect.sleep(settings.pollInterval);
				}
			});

		const phases = Effect.gen(function* () {
			// --- Init ---
			yield* enterPhase("Init");
			yield* validateRequest(request);
			const handle = yield* jobs.init();
			yield* Ref.update(state, (s) => ({ ...s, jobId: handle.jobId }));
			telemetry.setJobId(handle.jobId);

			// --- Uploading ---
			yield* enterPhase("Uploading");
			const inputLocation = yield* parseLocation(handle.inputStoragePath);
			const storage = yield* makeStorageClient(inputLocation);
			const uploads = yield* storage.upload(request.files, (outcome) =>
				Effect.zipRight(
					Ref.update(state, (s) => ({ ...s, uploads: [...s.uploads, outcome] })),
					notify({ type: "upload", outcome }),
				),
			);
			// Settled order while uploading; input order from here on
			yield* Ref.update(state, (s) => ({ ...s, uploads }));
			telemetry
				.setCount("files", request.files.length)
				.setCount(
					"uploadFailures",
					uploads.filter((outcome) => !outcome.uploaded).length,
				);

			// --- Starting ---
			yield* enterPhase("Starting");
			yield* jobs.start(handle, buildJobParameters(request, settings.model));

			// --- Polling ---
			yield* enterPhase("Polling");
			const jobState = yield* pollUntilTerminal(handle.jobId);
			if (jobState === JOB_STATE_FAILED) {
				return {
					_tag: "Failed",
					runId,
					jobId: handle.jobId,
					uploads,
					jobState,
				} satisfies BatchRunOutcome;
			}

			// --- Retrieving ---
			yield* enterPhase("Retrieving");
			const outputLocation = yield* parseLocation(handle.outputStoragePath);
			yield* storage.bind(outputLocation);
			const names = yield* storage.list();

			const results: ResultFile[] = [];
			const skipped: SkippedResult[] = [];
			for (const name of names) {
				if (!name.endsWith(RESULT_FILE_SUFFIX)) {
					continue;
				}
				const parsed = yield* storage.download(name).pipe(
					Effect.flatMap((content) => parseResultFile(name, content)),
					Effect.either,
				);
				if (Either.isRight(parsed)) {
					results.push(parsed.right);
				} else {
					skipped.push(parsed.left);
					yield* notify({ type: "result_skipped", error: parsed.left });
				}
			}

			return {
				_tag: "Completed",
				runId,
				jobId: handle.jobId,
				uploads,
				results,
				skipped,
			} satisfies BatchRunOutcome;
		});

		const cancelled = awaitAbort(options.signal).pipe(
			Effect.zipRight(Ref.get(state)),
			Effect.flatMap((s) => aborted(new BatchCancelledError({ phase: s.phase }))),
		);

		const outcome: BatchRunOutcome = yield* Effect.raceFirst(
			phases.pipe(Effect.catchAll(aborted)),
			cancelled,
		);

		// --- Telemetry ---
		const finalState = yield* Ref.get(state);
		telemetry.setCount("statusChecks", finalState.statusChecks);
		switch (outcome._tag) {
			case "Completed":
				telemetry
					.setOutcome("completed")
					.setCount("results", outcome.results.length)
					.setCount("skippedResults", outcome.skipped.length);
				break;
			case "Failed":
				telemetry.setOutcome("failed").setMetadata({ jobState: outcome.jobState });
				break;
			case "Aborted":
				telemetry.setError({
					type: outcome.error._tag,
					code: outcome.error._tag,
					message: outcome.error.message,
					phase: outcome.phase,
					retriable: isRetriable(outcome.error),
				});
				break;
		}
		emitEvent(
			outcome._tag === "Aborted" ? "error" : "info",
			"batch.run",
			telemetry.finalize(),
		);

		return outcome;
	});
