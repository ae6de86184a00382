// src/test-utils/datalake-mock.ts
import type {
	DataLakeClientsService,
	DataLakePath,
} from "../storage/datalake";
import type { StorageLocation } from "../storage/locator";

/**
 * Mock Data Lake client factory for testing storage and batch runs.
 *
 * This provides an in-memory store shared by every client it hands out,
 * with support for:
 * - Directory-scoped upload and download
 * - Recursive listing under a directory prefix
 * - Simulated failures per file or per operation
 * - Uploads that stay pending until their abort signal fires
 * - Store and call inspection via _store, _calls and _pending
 */

/**
 * Options for configuring mock behavior
 */
interface MockDataLakeOptions {
	/** File names whose upload fails */
	failUploads?: ReadonlyArray<string>;
	/** File names whose upload never settles unless aborted */
	hangUploads?: ReadonlyArray<string>;
	/** File names whose download fails with a non-404 error */
	failDownloads?: ReadonlyArray<string>;
	/** Simulate listing failures */
	failList?: boolean;
}

interface StoredFile {
	data: Uint8Array;
	contentType?: string;
}

type MockDataLakeClients = DataLakeClientsService & {
	/** Files keyed by "container/directory/name" */
	_store: Map<string, StoredFile>;
	/** Every SDK call made, e.g. "upload fs/in/a.wav" */
	_calls: string[];
	/** Abort signals of uploads held by `hangUploads`, keyed by path */
	_pending: Map<string, AbortSignal>;
	/** Seed a file at `location` */
	_put(location: StorageLocation, name: string, content: string | Uint8Array): void;
	/** Seed a directory entry at `location` */
	_mkdir(location: StorageLocation, name: string): void;
};

const pathIn = (location: StorageLocation, name: string): string =>
	location.directory
		? `${location.container}/${location.directory}/${name}`
		: `${location.container}/${name}`;

const notFound = (path: string) =>
	Object.assign(new Error(`The specified path does not exist: ${path}`), {
		statusCode: 404,
	});

/**
 * Creates a mock Data Lake client factory for testing.
 *
 * @example
 * ```ts
 * const clients = createMockDataLake({ failUploads: ["b.wav"] });
 * const layer = Layer.succeed(DataLakeClients, clients);
 *
 * // Inspect store directly
 * expect(clients._store.has("fs/in/a.wav")).toBe(true);
 * ```
 */
export function createMockDataLake(
	options?: MockDataLakeOptions,
): MockDataLakeClients {
	const store = new Map<string, StoredFile>();
	const directories = new Set<string>();
	const calls: string[] = [];
	const pending = new Map<string, AbortSignal>();

	return {
		directory: (location) => ({
			getFileClient: (name) => {
				const path = pathIn(location, name);
				return {
					upload: async (data, uploadOptions) => {
						calls.push(`upload ${path}`);
						if (options?.failUploads?.includes(name)) {
							throw new Error("Simulated upload failure");
						}
						const signal = uploadOptions.abortSignal;
						if (options?.hangUploads?.includes(name) && signal) {
							pending.set(path, signal);
							await new Promise<never>((_resolve, reject) => {
								signal.addEventListener(
									"abort",
									() => reject(new Error("The operation was aborted.")),
									{ once: true },
								);
							});
						}
						store.set(path, {
							data: new Uint8Array(data),
							contentType: uploadOptions.pathHttpHeaders.contentType,
						});
						return {};
					},

					readToBuffer: async () => {
						calls.push(`download ${path}`);
						if (options?.failDownloads?.includes(name)) {
							throw new Error("Simulated download failure");
						}
						const file = store.get(path);
						if (!file) {
							throw notFound(path);
						}
						return Buffer.from(file.data);
					},
				};
			},
		}),

		fileSystem: (location) => ({
			listPaths: (listOptions) => {
				calls.push(`list ${location.container}/${listOptions.path ?? ""}`);
				const prefix = listOptions.path
					? `${location.container}/${listOptions.path}/`
					: `${location.container}/`;

				return (async function* (): AsyncGenerator<DataLakePath> {
					if (options?.failList) {
						throw new Error("Simulated list failure");
					}
					for (const dir of directories) {
						if (dir.startsWith(prefix)) {
							yield {
								name: dir.slice(location.container.length + 1),
								isDirectory: true,
							};
						}
					}
					for (const key of store.keys()) {
						if (key.startsWith(prefix)) {
							yield {
								name: key.slice(location.container.length + 1),
								isDirectory: false,
							};
						}
					}
				})();
			},
		}),

		// Expose internals for test inspection
		_store: store,
		_calls: calls,
		_pending: pending,
		_put: (location, name, content) => {
			store.set(pathIn(location, name), {
				data:
					typeof content === "string"
						? new TextEncoder().encode(content)
						: content,
			});
		},
		_mkdir: (location, name) => {
			directories.add(pathIn(location, name));
		},
	};
}
