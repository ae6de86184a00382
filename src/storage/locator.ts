// src/storage/locator.ts
import { Effect, Either } from "effect";

import { MalformedLocationError } from "../models/errors";

/**
 * Storage URL decomposition.
 *
 * The job API hands out SAS-scoped URLs of the form
 *   https://{account}.blob.core.windows.net/{container}/{dir...}?{sas}
 *
 * Directory-level file operations need the hierarchical-namespace endpoint,
 * so the host's blob tier is rewritten to the dfs tier.
 */

const BLOB_TIER = ".blob.";
const HIERARCHICAL_TIER = ".dfs.";

export interface StorageLocation {
	/** scheme://host[:port], tier-normalized */
	readonly endpoint: string;
	readonly container: string;
	/** Path below the container, no leading or trailing "/"; "" is the root */
	readonly directory: string;
	/** Raw query string (SAS token), never decoded */
	readonly token: string;
}

/**
 * Replaces the blob tier marker in a host with the hierarchical one
 *
 * @example
 * normalizeHost("acct.blob.core.windows.net") // => "acct.dfs.core.windows.net"
 */
export function normalizeHost(host: string): string {
	return host.replaceAll(BLOB_TIER, HIERARCHICAL_TIER);
}

/**
 * Raw query of a URL string: everything after the first "?" up to any "#".
 * URL.search would re-encode characters, the SAS token must pass through as-is.
 */
function rawQuery(url: string): string {
	const withoutFragment = url.split("#", 1)[0];
	const queryStart = withoutFragment.indexOf("?");
	return queryStart === -1 ? "" : withoutFragment.slice(queryStart + 1);
}

/**
 * Parses a storage URL into its components.
 *
 * @example
 * parseLocationEither("https://acct.blob.core.windows.net/fs/a/b?sv=1")
 * // => Right({ endpoint: "https://acct.dfs.core.windows.net", container: "fs", directory: "a/b", token: "sv=1" })
 */
export function parseLocationEither(
	url: string,
): Either.Either<StorageLocation, MalformedLocationError> {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return Either.left(
			new MalformedLocationError({ url, reason: "not an absolute URL" }),
		);
	}

	if (!parsed.host) {
		return Either.left(
			new MalformedLocationError({ url, reason: "missing host" }),
		);
	}

	const segments = parsed.pathname.replace(/^\/+|\/+$/g, "").split("/");
	const [container, ...directory] = segments;
	if (!container) {
		return Either.left(
			new MalformedLocationError({ url, reason: "missing container segment" }),
		);
	}

	return Either.right({
		endpoint: `${parsed.protocol}//${normalizeHost(parsed.host)}`,
		container,
		directory: directory.join("/"),
		token: rawQuery(url),
	});
}

/**
 * Effect variant of parseLocationEither
 */
export const parseLocation = (
	url: string,
): Effect.Effect<StorageLocation, MalformedLocationError> =>
	Either.match(parseLocationEither(url), {
		onLeft: (error) => Effect.fail(error),
		onRight: (location) => Effect.succeed(location),
	});

/**
 * URL addressing the location's container, carrying the SAS token
 */
export function containerUrl(location: StorageLocation): string {
	return withToken(`${location.endpoint}/${location.container}`, location);
}

/**
 * URL addressing the location's directory, carrying the SAS token
 */
export function directoryUrl(location: StorageLocation): string {
	const path = location.directory
		? `${location.container}/${location.directory}`
		: location.container;
	return withToken(`${location.endpoint}/${path}`, location);
}

function withToken(base: string, location: StorageLocation): string {
	return location.token ? `${base}?${location.token}` : base;
}
