// src/storage/datalake.ts
import {
	DataLakeDirectoryClient,
	DataLakeFileSystemClient,
} from "@azure/storage-file-datalake";
import { Context, Layer } from "effect";

import { containerUrl, directoryUrl, type StorageLocation } from "./locator";

/**
 * The slice of the Azure Data Lake SDK the storage client uses.
 *
 * Directory-scoped clients write and read files; the container-scoped
 * file system client enumerates paths under a prefix. The store authorizes
 * and resolves paths differently for the two, so they stay separate.
 */

export interface DataLakePath {
	readonly name?: string;
	readonly isDirectory?: boolean;
}

export interface DataLakeUploadOptions {
	readonly pathHttpHeaders: { readonly contentType: string };
	readonly abortSignal?: AbortSignal;
}

export interface DataLakeFileHandle {
	/** Creates or overwrites the file with the given content */
	upload(data: Uint8Array, options: DataLakeUploadOptions): Promise<unknown>;
	readToBuffer(
		offset?: number,
		count?: number,
		options?: { readonly abortSignal?: AbortSignal },
	): Promise<Buffer>;
}

export interface DataLakeDirectoryHandle {
	getFileClient(fileName: string): DataLakeFileHandle;
}

export interface DataLakeFileSystemHandle {
	listPaths(options: {
		readonly path?: string;
		readonly recursive: boolean;
		readonly abortSignal?: AbortSignal;
	}): AsyncIterable<DataLakePath>;
}

/**
 * Factory for SAS-authenticated clients bound to a storage location
 */
export interface DataLakeClientsService {
	readonly directory: (location: StorageLocation) => DataLakeDirectoryHandle;
	readonly fileSystem: (location: StorageLocation) => DataLakeFileSystemHandle;
}

/**
 * Effect Context tag for the Data Lake client factory
 */
export class DataLakeClients extends Context.Tag("DataLakeClients")<
	DataLakeClients,
	DataLakeClientsService
>() {}

/**
 * Clients backed by the Azure SDK. The SAS token travels in the URL, so no
 * credential object is passed (anonymous credential).
 */
export const azureDataLakeClients: DataLakeClientsService = {
	directory: (location) => new DataLakeDirectoryClient(directoryUrl(location)),
	fileSystem: (location) => new DataLakeFileSystemClient(containerUrl(location)),
};

export const AzureDataLakeLayer: Layer.Layer<DataLakeClients> = Layer.succeed(
	DataLakeClients,
	azureDataLakeClients,
);
