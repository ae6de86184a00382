// src/server.ts
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import * as Layer from "effect/Layer";
import * as ManagedRuntime from "effect/ManagedRuntime";

import { CallAnalyticsServer } from "./agent/mcp-server";
import { AnalyticsConfig } from "./services/config";
import { JobClientLive } from "./services/job";
import { setEventSink } from "./services/telemetry";
import { AzureDataLakeLayer } from "./storage/datalake";

/**
 * MCP server over stdio.
 *
 * stdout carries the protocol, so every log line goes to stderr.
 * Settings come from the CALL_ANALYTICS_* environment variables; a missing
 * API key surfaces as an error response on the first tool call.
 */

setEventSink((_level, line) => {
	process.stderr.write(`${line}\n`);
});

const layer = Layer.merge(JobClientLive, AzureDataLakeLayer).pipe(
	Layer.provideMerge(AnalyticsConfig.fromEnv),
);

const app = new CallAnalyticsServer(ManagedRuntime.make(layer));

const shutdown = () => {
	app.close().then(
		() => process.exit(0),
		(error: unknown) => {
			process.stderr.write(`Shutdown failed: ${String(error)}\n`);
			process.exit(1);
		},
	);
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

await app.connect(new StdioServerTransport());
