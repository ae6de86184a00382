// src/agent/tools.test.ts
import { describe, expect, it } from "vitest";

import type { BatchRunOutcome } from "../models/batch";
import {
	JobStartError,
	ResultParseError,
	UploadError,
} from "../models/errors";
import {
	analyzeCallsInputSchema,
	formatErrorResponse,
	formatOutcomeResponse,
	formatToolResponse,
} from "./tools";

const parseText = (response: { content: Array<{ text: string }> }): unknown =>
	JSON.parse(response.content[0]?.text ?? "null");

describe("MCP Tool Schemas", () => {
	describe("analyzeCallsInputSchema", () => {
		it("should apply defaults for optional fields", () => {
			const result = analyzeCallsInputSchema.safeParse({ files: ["/calls/a.wav"] });

			expect(result.success).toBe(true);
			if (result.success) {
				expect(result.data).toEqual({
					files: ["/calls/a.wav"],
					questions: [],
					withDiarization: true,
					numSpeakers: 2,
				});
			}
		});

		it("should validate a full input", () => {
			const result = analyzeCallsInputSchema.safeParse({
				files: ["/calls/a.wav", "/calls/b.mp3"],
				questions: [
					{ text: "What is the issue?", type: "short answer" },
					{ text: "Resolved?", type: "boolean", description: "yes or no" },
				],
				withDiarization: false,
				numSpeakers: 10,
			});

			expect(result.success).toBe(true);
		});

		it("should require at least one file", () => {
			expect(analyzeCallsInputSchema.safeParse({ files: [] }).success).toBe(false);
			expect(analyzeCallsInputSchema.safeParse({}).success).toBe(false);
		});

		it("should keep the speaker count between 2 and 10", () => {
			const parse = (numSpeakers: number) =>
				analyzeCallsInputSchema.safeParse({ files: ["a.wav"], numSpeakers }).success;

			expect(parse(1)).toBe(false);
			expect(parse(2)).toBe(true);
			expect(parse(10)).toBe(true);
			expect(parse(11)).toBe(false);
			expect(parse(2.5)).toBe(false);
		});

		it("should reject unknown question types", () => {
			const result = analyzeCallsInputSchema.safeParse({
				files: ["a.wav"],
				questions: [{ text: "Mood?", type: "sentiment" }],
			});

			expect(result.success).toBe(false);
		});
	});
});

describe("Response Formatting", () => {
	it("should format data as pretty JSON text", () => {
		const response = formatToolResponse({ ok: true });

		expect(response.content).toEqual([{ type: "text", text: '{\n  "ok": true\n}' }]);
	});

	it("should omit details from errors when not given", () => {
		const response = formatErrorResponse({ code: "X", message: "boom" });

		expect(parseText(response)).toEqual({ error: { code: "X", message: "boom" } });
	});

	describe("formatOutcomeResponse", () => {
		const uploads = [
			{ fileName: "a.wav", contentType: "audio/wav", uploaded: true as const },
			{
				fileName: "b.wav",
				contentType: "audio/wav",
				uploaded: false as const,
				error: new UploadError({ fileName: "b.wav", cause: "403" }),
			},
		];

		it("should summarize a completed run", () => {
			const outcome: BatchRunOutcome = {
				_tag: "Completed",
				runId: "run-1",
				jobId: "J1",
				uploads,
				results: [
					{
						fileName: "r1.json",
						result: {
							transcript: "hello",
							answers: [{ question: "Q?", response: "yes", reasoning: "" }],
						},
					},
				],
				skipped: [new ResultParseError({ fileName: "bad.json", cause: "oops" })],
			};

			expect(parseText(formatOutcomeResponse(outcome))).toEqual({
				status: "completed",
				runId: "run-1",
				jobId: "J1",
				uploads: [
					{ fileName: "a.wav", uploaded: true },
					{ fileName: "b.wav", uploaded: false, error: 'Upload failed for "b.wav": 403' },
				],
				results: [
					{
						fileName: "r1.json",
						transcript: "hello",
						answers: [{ question: "Q?", response: "yes", reasoning: "" }],
					},
				],
				skipped: [
					{
						code: "ResultParseError",
						message: 'Result file "bad.json" could not be parsed: oops',
					},
				],
			});
		});

		it("should summarize a failed job", () => {
			const outcome: BatchRunOutcome = {
				_tag: "Failed",
				runId: "run-1",
				jobId: "J1",
				uploads: [],
				jobState: "Failed",
			};

			expect(parseText(formatOutcomeResponse(outcome))).toEqual({
				status: "failed",
				runId: "run-1",
				jobId: "J1",
				jobState: "Failed",
				uploads: [],
			});
		});

		it("should turn an aborted run into an error keyed by the error tag", () => {
			const outcome: BatchRunOutcome = {
				_tag: "Aborted",
				runId: "run-1",
				phase: "Starting",
				jobId: "J1",
				error: new JobStartError({ jobId: "J1", status: 500, body: "down" }),
				uploads: [],
			};

			expect(parseText(formatOutcomeResponse(outcome))).toEqual({
				error: {
					code: "JobStartError",
					message: 'Failed to start job "J1" (HTTP 500): down',
					details: { runId: "run-1", phase: "Starting", jobId: "J1", uploads: [] },
				},
			});
		});
	});
});
