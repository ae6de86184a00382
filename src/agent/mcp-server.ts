// src/agent/mcp-server.ts
import { readFile } from "node:fs/promises";
import { basename } from "node:path";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type * as ConfigError from "effect/ConfigError";
import type * as ManagedRuntime from "effect/ManagedRuntime";
import { nanoid } from "nanoid";

import { type BatchRequest, buildQuestions, type NamedBlob } from "../models/job";
import type { AnalyticsConfig } from "../services/config";
import type { JobClient } from "../services/job";
import { isRetriable, runBatch } from "../services/orchestrator";
import { emitEvent, ToolCallEventBuilder } from "../services/telemetry";
import type { DataLakeClients } from "../storage/datalake";
import {
	type AnalyzeCallsInput,
	analyzeCallsInputShape,
	formatErrorResponse,
	formatOutcomeResponse,
} from "./tools";

/**
 * Combined service type for the server runtime
 * - JobClient: job API over fetch
 * - DataLakeClients: SAS-authenticated storage clients
 * - AnalyticsConfig: settings (may fail to load from the environment)
 */
type ServerServices = JobClient | DataLakeClients | AnalyticsConfig;

export type ServerRuntime = ManagedRuntime.ManagedRuntime<
	ServerServices,
	ConfigError.ConfigError
>;

/**
 * Error raised when an input file cannot be read from disk
 */
class FileReadError extends Error {
	constructor(
		readonly path: string,
		cause: unknown,
	) {
		super(
			`Cannot read "${path}": ${cause instanceof Error ? cause.message : String(cause)}`,
		);
		this.name = "FileReadError";
	}
}

async function readInputFiles(
	paths: ReadonlyArray<string>,
): Promise<NamedBlob[]> {
	return Promise.all(
		paths.map(async (path) => {
			try {
				const data = await readFile(path);
				return { name: basename(path), data: new Uint8Array(data) };
			} catch (error) {
				throw new FileReadError(path, error);
			}
		}),
	);
}

/**
 * Call analytics MCP server
 *
 * Exposes one tool, analyze_calls, that runs a whole batch (upload, analyze,
 * collect results) and answers once the job has finished. Progress is
 * reported only through the run's log event.
 */
export class CallAnalyticsServer {
	readonly server = new McpServer({
		name: "call-analytics",
		version: "1.0.0",
	});

	constructor(private readonly runtime: ServerRuntime) {
		this.registerAnalyzeCallsTool();
	}

	connect(transport: Transport): Promise<void> {
		return this.server.connect(transport);
	}

	async close(): Promise<void> {
		await this.server.close();
		await this.runtime.dispose();
	}

	/**
	 * Emit telemetry for a tool call
	 */
	private emitToolTelemetry(
		builder: ToolCallEventBuilder,
		success: boolean,
	): void {
		emitEvent(success ? "info" : "error", "tool.call", builder.finalize());
	}

	/**
	 * Tool: analyze_calls
	 * Analyze a batch of call recordings and answer questions about each.
	 */
	private registerAnalyzeCallsTool(): void {
		this.server.registerTool(
			"analyze_calls",
			{
				description:
					"Transcribe call recordings and answer questions about each call. Runs one batch job and waits for it to finish.",
				inputSchema: analyzeCallsInputShape,
			},
			async (params: AnalyzeCallsInput, extra) => {
				const runId = nanoid();
				const telemetry = new ToolCallEventBuilder("analyze_calls", runId);
				telemetry.startPhase("read");

				try {
					const files = await readInputFiles(params.files);
					const request: BatchRequest = {
						files,
						questions: buildQuestions(params.questions),
						withDiarization: params.withDiarization,
						numSpeakers: params.numSpeakers,
					};

					telemetry.endPhase("read");
					telemetry.startPhase("batch");

					const outcome = await this.runtime.runPromise(
						runBatch(request, { runId, signal: extra.signal }),
					);

					telemetry.endPhase("batch");
					telemetry.setMetadata({
						files: files.length,
						questions: request.questions.length,
						outcome: outcome._tag,
					});

					if (outcome._tag === "Aborted") {
						telemetry.setError({
							type: outcome.error._tag,
							code: outcome.error._tag,
							message: outcome.error.message,
							retriable: isRetriable(outcome.error),
						});
						this.emitToolTelemetry(telemetry, false);
					} else {
						this.emitToolTelemetry(telemetry, true);
					}

					return formatOutcomeResponse(outcome);
				} catch (error) {
					const errorName =
						error instanceof Error ? error.name : "UnknownError";
					const errorMessage =
						error instanceof Error ? error.message : String(error);
					telemetry.setError({
						type: errorName,
						code: errorName,
						message: errorMessage,
						retriable: false,
					});
					this.emitToolTelemetry(telemetry, false);
					return formatErrorResponse({
						code: errorName,
						message: errorMessage,
						...(error instanceof FileReadError
							? { details: { path: error.path } }
							: {}),
					});
				}
			},
		);
	}
}
