import { ParseResult, Schema } from "effect";
import * as Predicate from "effect/Predicate";

// Type IDs for error identification
export const StorageErrorTypeId: unique symbol = Symbol.for(
	"@call-analytics/StorageError",
);
export type StorageErrorTypeId = typeof StorageErrorTypeId;

export const JobApiErrorTypeId: unique symbol = Symbol.for(
	"@call-analytics/JobApiError",
);
export type JobApiErrorTypeId = typeof JobApiErrorTypeId;

export const BatchErrorTypeId: unique symbol = Symbol.for(
	"@call-analytics/BatchError",
);
export type BatchErrorTypeId = typeof BatchErrorTypeId;

/**
 * Phases of a batch run, in execution order.
 * "Retrieving" covers listing and downloading the job's result files.
 */
export const BatchPhase = Schema.Literal(
	"Init",
	"Uploading",
	"Starting",
	"Polling",
	"Retrieving",
);
export type BatchPhase = typeof BatchPhase.Type;

// --- Storage Errors ---

/**
 * Storage URL could not be decomposed into endpoint, container and directory
 */
export class MalformedLocationError extends Schema.TaggedError<MalformedLocationError>()(
	"MalformedLocationError",
	{
		url: Schema.String,
		reason: Schema.String,
	},
) {
	/** @public Used by isStorageError type guard */
	readonly [StorageErrorTypeId]: StorageErrorTypeId = StorageErrorTypeId;
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		return `Malformed storage location: ${this.reason}`;
	}
}

/**
 * A single file could not be written to the input directory.
 * Never aborts a batch; reported in the run's upload outcomes.
 */
export class UploadError extends Schema.TaggedError<UploadError>()(
	"UploadError",
	{
		fileName: Schema.String,
		cause: Schema.String,
	},
) {
	/** @public Used by isStorageError type guard */
	readonly [StorageErrorTypeId]: StorageErrorTypeId = StorageErrorTypeId;
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		return `Upload failed for "${this.fileName}": ${this.cause}`;
	}
}

export class ObjectNotFoundError extends Schema.TaggedError<ObjectNotFoundError>()(
	"ObjectNotFoundError",
	{
		fileName: Schema.String,
		directory: Schema.String,
	},
) {
	/** @public Used by isStorageError type guard */
	readonly [StorageErrorTypeId]: StorageErrorTypeId = StorageErrorTypeId;
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		return `Object "${this.fileName}" not found in "${this.directory || "/"}"`;
	}
}

/**
 * Storage request failed for any reason other than a missing object
 * (connection failure, timeout, rejected SAS token, ...)
 */
export class TransportError extends Schema.TaggedError<TransportError>()(
	"TransportError",
	{
		operation: Schema.Literal("list", "download"),
		cause: Schema.String,
	},
) {
	/** @public Used by isStorageError type guard */
	readonly [StorageErrorTypeId]: StorageErrorTypeId = StorageErrorTypeId;
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		return `Storage ${this.operation} failed: ${this.cause}`;
	}
}

type StorageError =
	| MalformedLocationError
	| UploadError
	| ObjectNotFoundError
	| TransportError;

export const isStorageError = (u: unknown): u is StorageError =>
	Predicate.hasProperty(u, StorageErrorTypeId);

// --- Job API Errors ---

export class JobInitError extends Schema.TaggedError<JobInitError>()(
	"JobInitError",
	{
		status: Schema.optionalWith(Schema.Number, { exact: true }),
		body: Schema.String,
	},
) {
	/** @public Used by isJobApiError type guard */
	readonly [JobApiErrorTypeId]: JobApiErrorTypeId = JobApiErrorTypeId;
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		if (this.status !== undefined) {
			return `Failed to initialize job (HTTP ${this.status}): ${this.body}`;
		}
		return `Failed to initialize job: ${this.body}`;
	}
}

export class JobStartError extends Schema.TaggedError<JobStartError>()(
	"JobStartError",
	{
		jobId: Schema.String,
		status: Schema.optionalWith(Schema.Number, { exact: true }),
		body: Schema.String,
	},
) {
	/** @public Used by isJobApiError type guard */
	readonly [JobApiErrorTypeId]: JobApiErrorTypeId = JobApiErrorTypeId;
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		if (this.status !== undefined) {
			return `Failed to start job "${this.jobId}" (HTTP ${this.status}): ${this.body}`;
		}
		return `Failed to start job "${this.jobId}": ${this.body}`;
	}
}

export class StatusFetchError extends Schema.TaggedError<StatusFetchError>()(
	"StatusFetchError",
	{
		jobId: Schema.String,
		status: Schema.optionalWith(Schema.Number, { exact: true }),
		cause: Schema.String,
	},
) {
	/** @public Used by isJobApiError type guard */
	readonly [JobApiErrorTypeId]: JobApiErrorTypeId = JobApiErrorTypeId;
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		if (this.status !== undefined) {
			return `Failed to get status of job "${this.jobId}" (HTTP ${this.status}): ${this.cause}`;
		}
		return `Failed to get status of job "${this.jobId}": ${this.cause}`;
	}
}

type JobApiError = JobInitError | JobStartError | StatusFetchError;

export const isJobApiError = (u: unknown): u is JobApiError =>
	Predicate.hasProperty(u, JobApiErrorTypeId);

// --- Batch Errors ---

export class ResultParseError extends Schema.TaggedError<ResultParseError>()(
	"ResultParseError",
	{
		fileName: Schema.String,
		cause: Schema.String,
	},
) {
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		return `Result file "${this.fileName}" could not be parsed: ${this.cause}`;
	}
}

export class InvalidRequestError extends Schema.TaggedError<InvalidRequestError>()(
	"InvalidRequestError",
	{ reason: Schema.String },
) {
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		return `Invalid batch request: ${this.reason}`;
	}
}

export class BatchCancelledError extends Schema.TaggedError<BatchCancelledError>()(
	"BatchCancelledError",
	{ phase: BatchPhase },
) {
	/** @public Used by isBatchError type guard */
	readonly [BatchErrorTypeId]: BatchErrorTypeId = BatchErrorTypeId;

	override get message(): string {
		return `Batch run cancelled during ${this.phase}`;
	}
}

export type BatchError =
	| StorageError
	| JobApiError
	| ResultParseError
	| InvalidRequestError
	| BatchCancelledError;

export const isBatchError = (u: unknown): u is BatchError =>
	Predicate.hasProperty(u, BatchErrorTypeId);

/**
 * One line per schema issue, prefixed with its path when it has one
 */
export function formatParseError(error: ParseResult.ParseError): string {
	return ParseResult.ArrayFormatter.formatErrorSync(error)
		.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
		.join("; ");
}
