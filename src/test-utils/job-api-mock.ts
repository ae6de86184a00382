// src/test-utils/job-api-mock.ts
import { vi } from "vitest";

import { API_KEY_HEADER } from "../services/job";

/**
 * Scripted fetch for the call-analytics job API.
 *
 * Routes by method and path:
 * - POST .../job/init          -> `init`
 * - POST .../job               -> `start`
 * - GET  .../job/{id}/status   -> next entry of `statuses` (the last repeats)
 *
 * A `hangReply` never answers; the request stays pending until its signal
 * aborts, and the signal is kept in `pending`.
 *
 * Install with `vi.stubGlobal("fetch", api.fetch)`.
 */

export type Reply =
	| { readonly status: number; readonly body: string }
	| { readonly networkError: string }
	| { readonly hang: true };

export const hangReply: Reply = { hang: true };

export interface RecordedRequest {
	method: string;
	url: string;
	apiKey: string | null;
	contentType: string | null;
	body?: unknown;
}

interface JobApiScript {
	init?: Reply;
	start?: Reply;
	statuses?: ReadonlyArray<Reply>;
}

export const jsonReply = (status: number, value: unknown): Reply => ({
	status,
	body: JSON.stringify(value),
});

export const stateReply = (jobState: string): Reply =>
	jsonReply(200, { job_state: jobState });

export const initReply = (
	jobId: string,
	input: string,
	output: string,
): Reply =>
	jsonReply(202, {
		job_id: jobId,
		input_storage_path: input,
		output_storage_path: output,
	});

const abortError = () =>
	Object.assign(new Error("The operation was aborted."), { name: "AbortError" });

const requestUrl = (input: string | URL | Request): string =>
	typeof input === "string"
		? input
		: input instanceof URL
			? input.toString()
			: input.url;

export function createJobApiMock(script: JobApiScript) {
	const requests: RecordedRequest[] = [];
	const pending: AbortSignal[] = [];
	let statusIndex = 0;

	const toResponse = (
		reply: Reply,
		signal?: AbortSignal | null,
	): Promise<Response> => {
		if ("hang" in reply) {
			if (!signal) {
				return Promise.reject(new Error("hanging request needs a signal"));
			}
			pending.push(signal);
			return new Promise((_resolve, reject) => {
				signal.addEventListener("abort", () => reject(abortError()), {
					once: true,
				});
			});
		}
		if ("networkError" in reply) {
			return Promise.reject(new TypeError(reply.networkError));
		}
		return Promise.resolve(new Response(reply.body, { status: reply.status }));
	};

	const fetch = vi.fn(
		async (input: string | URL | Request, init?: RequestInit) => {
			const url = requestUrl(input);
			const method = init?.method ?? "GET";
			const headers = new Headers(init?.headers);
			const body = init?.body;
			requests.push({
				method,
				url,
				apiKey: headers.get(API_KEY_HEADER),
				contentType: headers.get("Content-Type"),
				...(typeof body === "string" ? { body: JSON.parse(body) } : {}),
			});

			const path = new URL(url).pathname;
			if (method === "POST" && path.endsWith("/job/init")) {
				return toResponse(
					script.init ?? jsonReply(500, { error: "no init scripted" }),
					init?.signal,
				);
			}
			if (method === "POST" && path.endsWith("/job")) {
				return toResponse(
					script.start ?? jsonReply(200, { status: "ok" }),
					init?.signal,
				);
			}
			if (method === "GET" && path.endsWith("/status")) {
				const statuses = script.statuses ?? [];
				const reply = statuses[Math.min(statusIndex, statuses.length - 1)];
				statusIndex++;
				return toResponse(
					reply ?? jsonReply(404, { error: "no status scripted" }),
					init?.signal,
				);
			}
			return toResponse(jsonReply(404, { error: `no route for ${method} ${path}` }));
		},
	);

	return {
		fetch,
		requests,
		/** Signals of requests answered with `hangReply` */
		pending,
		/** Requests to a path ending in `suffix` */
		requestsTo: (suffix: string) =>
			requests.filter((r) => new URL(r.url).pathname.endsWith(suffix)),
	};
}
