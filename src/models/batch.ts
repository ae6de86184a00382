import type { Duration } from "effect";

import type {
	BatchError,
	BatchPhase,
	ObjectNotFoundError,
	ResultParseError,
	StatusFetchError,
	TransportError,
	UploadError,
} from "./errors";
import type { AnalysisResult } from "./job";

/**
 * Per-file result of an upload. Failures never abort the batch.
 */
export type UploadOutcome =
	| {
			readonly fileName: string;
			readonly contentType: string;
			readonly uploaded: true;
	  }
	| {
			readonly fileName: string;
			readonly contentType: string;
			readonly uploaded: false;
			readonly error: UploadError;
	  };

/**
 * A parsed result together with the output file it came from
 */
export interface ResultFile {
	readonly fileName: string;
	readonly result: AnalysisResult;
}

/**
 * Why a listed result file is missing from the results
 */
export type SkippedResult =
	| ResultParseError
	| ObjectNotFoundError
	| TransportError;

/**
 * How a batch run ended.
 *
 * - Completed: the job finished and its result files were read
 * - Failed: the job ran and the API reported it failed
 * - Aborted: the run stopped locally; `phase` says where. Aborted in
 *   Init/Uploading/Starting means the job never started, in Polling that its
 *   state became unknown, in Retrieving that it completed but results could
 *   not be listed.
 */
export type BatchRunOutcome =
	| {
			readonly _tag: "Completed";
			readonly runId: string;
			readonly jobId: string;
			readonly uploads: ReadonlyArray<UploadOutcome>;
			/** In output listing order, which the store does not keep stable */
			readonly results: ReadonlyArray<ResultFile>;
			readonly skipped: ReadonlyArray<SkippedResult>;
	  }
	| {
			readonly _tag: "Failed";
			readonly runId: string;
			readonly jobId: string;
			readonly uploads: ReadonlyArray<UploadOutcome>;
			readonly jobState: string;
	  }
	| {
			readonly _tag: "Aborted";
			readonly runId: string;
			readonly phase: BatchPhase;
			readonly error: BatchError;
			/** Absent when init never returned a job */
			readonly jobId?: string;
			readonly uploads: ReadonlyArray<UploadOutcome>;
	  };

/**
 * Progress notifications delivered while a run is in flight
 */
export type BatchEvent =
	| { readonly type: "phase"; readonly phase: BatchPhase }
	| { readonly type: "upload"; readonly outcome: UploadOutcome }
	| {
			readonly type: "status";
			readonly jobState: string;
			readonly check: number;
	  }
	| {
			readonly type: "status_unavailable";
			readonly error: StatusFetchError;
			readonly consecutiveFailures: number;
	  }
	| { readonly type: "waiting"; readonly interval: Duration.Duration }
	| { readonly type: "result_skipped"; readonly error: SkippedResult };
