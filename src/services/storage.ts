// src/services/storage.ts
import { Chunk, Duration, Effect, Option, Ref, Stream } from "effect";
import * as Predicate from "effect/Predicate";
import { lookup } from "mime-types";

import type { UploadOutcome } from "../models/batch";
import {
	ObjectNotFoundError,
	TransportError,
	UploadError,
} from "../models/errors";
import type { NamedBlob } from "../models/job";
import { DataLakeClients } from "../storage/datalake";
import type { StorageLocation } from "../storage/locator";
import { AnalyticsConfig } from "./config";

/**
 * Storage client for one batch run.
 *
 * Bound to a single StorageLocation at a time: the job's input directory
 * while uploading, then rebound to the output directory to fetch results.
 *
 * - Uploads and downloads go through a directory-scoped client
 * - Listing goes through a container-scoped client with the directory as prefix
 *
 * Concurrency: `bind` swaps the location used by operations started after it.
 * It is not safe to rebind while an upload, list or download started on the
 * same instance is still running.
 */

// =============================================================================
// Constants
// =============================================================================

/** Content type for files whose extension has no known MIME type */
export const DEFAULT_CONTENT_TYPE = "audio/wav";

// =============================================================================
// Service Interface
// =============================================================================

export interface StorageClient {
	/** The location operations currently target */
	readonly location: Effect.Effect<StorageLocation>;

	readonly bind: (location: StorageLocation) => Effect.Effect<void>;

	/**
	 * Upload every file into the bound directory, overwriting existing ones.
	 * Outcomes are returned in input order; `onOutcome` sees each one as soon
	 * as its upload settles.
	 */
	readonly upload: (
		files: ReadonlyArray<NamedBlob>,
		onOutcome?: (outcome: UploadOutcome) => Effect.Effect<void>,
	) => Effect.Effect<ReadonlyArray<UploadOutcome>>;

	/**
	 * Names (last path segment) of every file under the bound directory,
	 * recursively, in enumeration order
	 */
	readonly list: () => Effect.Effect<ReadonlyArray<string>, TransportError>;

	readonly download: (
		fileName: string,
	) => Effect.Effect<Uint8Array, ObjectNotFoundError | TransportError>;
}

// =============================================================================
// Implementation Helpers
// =============================================================================

/**
 * MIME type from a file name, falling back to DEFAULT_CONTENT_TYPE
 */
export function contentTypeFor(fileName: string): string {
	return lookup(fileName) || DEFAULT_CONTENT_TYPE;
}

function basename(path: string): string {
	const segments = path.split("/");
	return segments[segments.length - 1];
}

function causeOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Storage SDK errors carry the HTTP status of the failed request */
function isNotFound(error: unknown): boolean {
	return Predicate.hasProperty(error, "statusCode") && error.statusCode === 404;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a StorageClient bound to `initial`
 */
export const makeStorageClient = (
	initial: StorageLocation,
): Effect.Effect<StorageClient, never, DataLakeClients | AnalyticsConfig> =>
	Effect.gen(function* () {
		const clients = yield* DataLakeClients;
		const settings = yield* AnalyticsConfig;
		const binding = yield* Ref.make(initial);

		const timedOut = `timed out after ${Duration.format(settings.requestTimeout)}`;

		const uploadOne = (
			location: StorageLocation,
			file: NamedBlob,
		): Effect.Effect<UploadOutcome> => {
			const contentType = contentTypeFor(file.name);
			return Effect.tryPromise({
				try: (signal) =>
					clients
						.directory(location)
						.getFileClient(file.name)
						.upload(file.data, {
							pathHttpHeaders: { contentType },
							abortSignal: signal,
						}),
				catch: (error) =>
					new UploadError({ fileName: file.name, cause: causeOf(error) }),
			}).pipe(
				Effect.timeoutFail({
					duration: settings.requestTimeout,
					onTimeout: () =>
						new UploadError({ fileName: file.name, cause: timedOut }),
				}),
				Effect.match({
					onFailure: (error): UploadOutcome => ({
						fileName: file.name,
						contentType,
						uploaded: false,
						error,
					}),
					onSuccess: (): UploadOutcome => ({
						fileName: file.name,
						contentType,
						uploaded: true,
					}),
				}),
			);
		};

		return {
			location: Ref.get(binding),

			bind: (location) => Ref.set(binding, location),

			upload: (files, onOutcome) =>
				Effect.gen(function* () {
					const location = yield* Ref.get(binding);
					return yield* Effect.forEach(
						files,
						(file) =>
							onOutcome === undefined
								? uploadOne(location, file)
								: Effect.tap(uploadOne(location, file), onOutcome),
						{ concurrency: settings.uploadConcurrency },
					);
				}),

			list: () =>
				Effect.scoped(
					Effect.gen(function* () {
						const location = yield* Ref.get(binding);
						const names = yield* Ref.make(Chunk.empty<string>());

						// Aborts the enumeration's HTTP requests if the list is interrupted
						const controller = yield* Effect.acquireRelease(
							Effect.sync(() => new AbortController()),
							(c) => Effect.sync(() => c.abort()),
						);

						const fileSystem = yield* Effect.try({
							try: () => clients.fileSystem(location),
							catch: (error) =>
								new TransportError({ operation: "list", cause: causeOf(error) }),
						});

						yield* Stream.fromAsyncIterable(
							fileSystem.listPaths({
								path: location.directory || undefined,
								recursive: true,
								abortSignal: controller.signal,
							}),
							(error) =>
								new TransportError({ operation: "list", cause: causeOf(error) }),
						).pipe(
							Stream.filterMap((path): Option.Option<string> =>
								path.isDirectory || !path.name
									? Option.none()
									: Option.some(basename(path.name)),
							),
							Stream.runForEach((name) =>
								Ref.update(names, (all) => Chunk.append(all, name)),
							),
							Effect.timeoutFail({
								duration: settings.requestTimeout,
								onTimeout: () =>
									new TransportError({ operation: "list", cause: timedOut }),
							}),
						);

						return Chunk.toReadonlyArray(yield* Ref.get(names));
					}),
				),

			download: (fileName) =>
				Effect.gen(function* () {
					const location = yield* Ref.get(binding);
					return yield* Effect.tryPromise({
						try: (signal): Promise<Uint8Array> =>
							clients
								.directory(location)
								.getFileClient(fileName)
								.readToBuffer(undefined, undefined, { abortSignal: signal }),
						catch: (error) =>
							isNotFound(error)
								? new ObjectNotFoundError({
										fileName,
										directory: location.directory,
									})
								: new TransportError({
										operation: "download",
										cause: causeOf(error),
									}),
					}).pipe(
						Effect.timeoutFail({
							duration: settings.requestTimeout,
							onTimeout: () =>
								new TransportError({ operation: "download", cause: timedOut }),
						}),
					);
				}),
		};
	});
