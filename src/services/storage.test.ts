import { Cause, Effect, Exit, Layer, Option } from "effect";
import { describe, expect, it } from "vitest";

import { ObjectNotFoundError, TransportError, UploadError } from "../models/errors";
import { DataLakeClients } from "../storage/datalake";
import type { StorageLocation } from "../storage/locator";
import { createMockDataLake } from "../test-utils/datalake-mock";
import { AnalyticsConfig } from "./config";
import {
	contentTypeFor,
	DEFAULT_CONTENT_TYPE,
	makeStorageClient,
	type StorageClient,
} from "./storage";

const input: StorageLocation = {
	endpoint: "https://acct.dfs.core.windows.net",
	container: "fs",
	directory: "in",
	token: "sas",
};

const output: StorageLocation = { ...input, directory: "out" };

const bytes = (...values: number[]) => new Uint8Array(values);

/**
 * Helper to run an effect against a StorageClient bound to `input`
 */
function runWithClient<A, E>(
	clients: ReturnType<typeof createMockDataLake>,
	use: (storage: StorageClient) => Effect.Effect<A, E>,
): Promise<Exit.Exit<A, E>> {
	const layer = Layer.merge(
		Layer.succeed(DataLakeClients, clients),
		AnalyticsConfig.make({ apiKey: "test-secret" }),
	);
	return Effect.runPromiseExit(
		Effect.provide(Effect.flatMap(makeStorageClient(input), use), layer),
	);
}

function valueOf<A, E>(exit: Exit.Exit<A, E>): A {
	if (Exit.isFailure(exit)) {
		throw new Error(`expected success, got ${Cause.pretty(exit.cause)}`);
	}
	return exit.value;
}

function failureOf<A, E>(exit: Exit.Exit<A, E>): E | undefined {
	return Exit.isFailure(exit)
		? Option.getOrUndefined(Cause.failureOption(exit.cause))
		: undefined;
}

describe("StorageClient", () => {
	describe("contentTypeFor", () => {
		it("should look up the MIME type from the extension", () => {
			expect(contentTypeFor("notes.txt")).toBe("text/plain");
			expect(contentTypeFor("r1.json")).toBe("application/json");
		});

		it("should fall back to audio/wav for unknown extensions", () => {
			expect(contentTypeFor("call.unknownext")).toBe(DEFAULT_CONTENT_TYPE);
			expect(contentTypeFor("recording")).toBe("audio/wav");
		});
	});

	describe("upload", () => {
		it("should write each file into the bound directory with its content type", async () => {
			const clients = createMockDataLake();

			const outcomes = valueOf(
				await runWithClient(clients, (storage) =>
					storage.upload([
						{ name: "notes.txt", data: bytes(1) },
						{ name: "call.unknownext", data: bytes(2) },
					]),
				),
			);

			expect(outcomes).toEqual([
				{ fileName: "notes.txt", contentType: "text/plain", uploaded: true },
				{ fileName: "call.unknownext", contentType: "audio/wav", uploaded: true },
			]);
			expect(clients._store.get("fs/in/notes.txt")?.contentType).toBe("text/plain");
			expect(clients._store.get("fs/in/call.unknownext")?.contentType).toBe(
				"audio/wav",
			);
		});

		it("should report failures per file without stopping the others", async () => {
			const clients = createMockDataLake({ failUploads: ["a.wav"] });

			const outcomes = valueOf(
				await runWithClient(clients, (storage) =>
					storage.upload([
						{ name: "a.wav", data: bytes(1) },
						{ name: "b.wav", data: bytes(2) },
					]),
				),
			);

			expect(outcomes).toHaveLength(2);
			const [first, second] = outcomes;
			expect(first?.uploaded).toBe(false);
			if (first && !first.uploaded) {
				expect(first.error).toBeInstanceOf(UploadError);
				expect(first.error.fileName).toBe("a.wav");
				expect(first.error.cause).toBe("Simulated upload failure");
			}
			expect(second?.uploaded).toBe(true);
			expect(clients._store.has("fs/in/a.wav")).toBe(false);
			expect(clients._store.has("fs/in/b.wav")).toBe(true);
		});

		it("should hand each outcome to onOutcome as it settles", async () => {
			const clients = createMockDataLake({ failUploads: ["b.wav"] });
			const seen: Array<[string, boolean]> = [];

			await runWithClient(clients, (storage) =>
				storage.upload(
					[
						{ name: "a.wav", data: bytes(1) },
						{ name: "b.wav", data: bytes(2) },
					],
					(outcome) =>
						Effect.sync(() => {
							seen.push([outcome.fileName, outcome.uploaded]);
						}),
				),
			);

			expect(seen).toHaveLength(2);
			expect(seen).toEqual(
				expect.arrayContaining([
					["a.wav", true],
					["b.wav", false],
				]),
			);
		});

		it("should overwrite an existing file", async () => {
			const clients = createMockDataLake();

			await runWithClient(clients, (storage) =>
				Effect.zipRight(
					storage.upload([{ name: "a.wav", data: bytes(1) }]),
					storage.upload([{ name: "a.wav", data: bytes(9, 9) }]),
				),
			);

			expect(Array.from(clients._store.get("fs/in/a.wav")?.data ?? [])).toEqual([9, 9]);
		});
	});

	describe("download", () => {
		it("should return the uploaded bytes unchanged", async () => {
			const clients = createMockDataLake();

			const content = valueOf(
				await runWithClient(clients, (storage) =>
					Effect.zipRight(
						storage.upload([{ name: "a.wav", data: bytes(0, 127, 255) }]),
						storage.download("a.wav"),
					),
				),
			);

			expect(Array.from(content)).toEqual([0, 127, 255]);
		});

		it("should fail with ObjectNotFoundError for a missing file", async () => {
			const clients = createMockDataLake();

			const error = failureOf(
				await runWithClient(clients, (storage) => storage.download("missing.json")),
			);

			expect(error).toBeInstanceOf(ObjectNotFoundError);
			if (error instanceof ObjectNotFoundError) {
				expect(error.fileName).toBe("missing.json");
				expect(error.directory).toBe("in");
			}
		});

		it("should fail with TransportError for any other failure", async () => {
			const clients = createMockDataLake({ failDownloads: ["r1.json"] });
			clients._put(input, "r1.json", "{}");

			const error = failureOf(
				await runWithClient(clients, (storage) => storage.download("r1.json")),
			);

			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(error.operation).toBe("download");
			}
		});
	});

	describe("list", () => {
		it("should return one basename per uploaded file", async () => {
			const clients = createMockDataLake();

			const names = valueOf(
				await runWithClient(clients, (storage) =>
					Effect.zipRight(
						storage.upload([
							{ name: "x.wav", data: bytes(1) },
							{ name: "y.wav", data: bytes(2) },
							{ name: "z.wav", data: bytes(3) },
						]),
						storage.list(),
					),
				),
			);

			expect([...names].sort()).toEqual(["x.wav", "y.wav", "z.wav"]);
		});

		it("should recurse into subdirectories and skip directory entries", async () => {
			const clients = createMockDataLake();
			clients._put(input, "r1.json", "{}");
			clients._mkdir(input, "nested");
			clients._put(input, "nested/r2.json", "{}");

			const names = valueOf(
				await runWithClient(clients, (storage) => storage.list()),
			);

			expect([...names].sort()).toEqual(["r1.json", "r2.json"]);
		});

		it("should only list the bound directory", async () => {
			const clients = createMockDataLake();
			clients._put(input, "a.wav", "audio");
			clients._put(output, "r1.json", "{}");

			const names = valueOf(
				await runWithClient(clients, (storage) =>
					Effect.zipRight(storage.bind(output), storage.list()),
				),
			);

			expect(names).toEqual(["r1.json"]);
			expect(clients._calls).toEqual(["list fs/out"]);
		});

		it("should list the whole container when the directory is empty", async () => {
			const clients = createMockDataLake();
			clients._put({ ...input, directory: "" }, "top.json", "{}");

			const names = valueOf(
				await runWithClient(clients, (storage) =>
					Effect.zipRight(storage.bind({ ...input, directory: "" }), storage.list()),
				),
			);

			expect(names).toEqual(["top.json"]);
			expect(clients._calls).toEqual(["list fs/"]);
		});

		it("should fail with TransportError when enumeration fails", async () => {
			const clients = createMockDataLake({ failList: true });

			const error = failureOf(
				await runWithClient(clients, (storage) => storage.list()),
			);

			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(error.operation).toBe("list");
				expect(error.cause).toBe("Simulated list failure");
			}
		});
	});
});
