// src/agent/tools.ts
import { z } from "zod";

import type { BatchRunOutcome, SkippedResult, UploadOutcome } from "../models/batch";
import { QuestionType } from "../models/job";

/**
 * MCP tool schemas using Zod (required by MCP SDK)
 *
 * Note: We use Zod here because the MCP SDK's registerTool() method
 * only accepts Zod shapes. The canonical domain models use Effect Schema
 * in ../models/; the question types are taken from there to keep the
 * rules in sync.
 */

export const MIN_SPEAKERS = 2;
export const MAX_SPEAKERS = 10;
export const DEFAULT_SPEAKERS = 2;

/**
 * Input shape for the analyze_calls tool
 */
export const analyzeCallsInputShape = {
	files: z
		.array(z.string().min(1))
		.min(1)
		.describe("Paths of the audio files to analyze. File names must be unique."),

	questions: z
		.array(
			z.object({
				text: z.string().describe("Question asked of every call."),
				type: z.enum(QuestionType.literals).describe("Expected answer type."),
				description: z
					.string()
					.optional()
					.describe("Extra guidance for answering the question."),
			}),
		)
		.default([])
		.describe("Questions in display order. Blank questions are ignored."),

	withDiarization: z
		.boolean()
		.default(true)
		.describe("Label speakers in the transcript. Defaults to true."),

	numSpeakers: z
		.number()
		.int()
		.min(MIN_SPEAKERS)
		.max(MAX_SPEAKERS)
		.default(DEFAULT_SPEAKERS)
		.describe(`Speakers per call (${MIN_SPEAKERS}-${MAX_SPEAKERS}). Default ${DEFAULT_SPEAKERS}.`),
};

export const analyzeCallsInputSchema = z.object(analyzeCallsInputShape);
export type AnalyzeCallsInput = z.infer<typeof analyzeCallsInputSchema>;

/**
 * MCP tool response type - uses index signature for SDK compatibility
 */
interface ToolResponse {
	[key: string]: unknown;
	content: Array<{
		type: "text";
		text: string;
	}>;
}

/**
 * Format data as MCP tool response
 */
export const formatToolResponse = (data: unknown): ToolResponse => ({
	content: [
		{
			type: "text",
			text: JSON.stringify(data, null, 2),
		},
	],
});

/**
 * Format error as MCP tool response
 */
export const formatErrorResponse = (error: {
	code: string;
	message: string;
	details?: unknown;
}): ToolResponse => {
	const errorObj: Record<string, unknown> = {
		code: error.code,
		message: error.message,
	};
	if (error.details !== undefined) {
		errorObj.details = error.details;
	}
	return {
		content: [
			{
				type: "text",
				text: JSON.stringify({ error: errorObj }, null, 2),
			},
		],
	};
};

const summarizeUpload = (outcome: UploadOutcome) =>
	outcome.uploaded
		? { fileName: outcome.fileName, uploaded: true }
		: {
				fileName: outcome.fileName,
				uploaded: false,
				error: outcome.error.message,
			};

const summarizeSkipped = (error: SkippedResult) => ({
	code: error._tag,
	message: error.message,
});

/**
 * Format a run outcome as MCP tool response.
 * Aborted runs become error responses whose code is the error's tag.
 */
export const formatOutcomeResponse = (outcome: BatchRunOutcome): ToolResponse => {
	switch (outcome._tag) {
		case "Completed":
			return formatToolResponse({
				status: "completed",
				runId: outcome.runId,
				jobId: outcome.jobId,
				uploads: outcome.uploads.map(summarizeUpload),
				results: outcome.results.map(({ fileName, result }) => ({
					fileName,
					transcript: result.transcript,
					diarizedTranscript: result.diarized_transcript,
					answers: result.answers,
				})),
				skipped: outcome.skipped.map(summarizeSkipped),
			});
		case "Failed":
			return formatToolResponse({
				status: "failed",
				runId: outcome.runId,
				jobId: outcome.jobId,
				jobState: outcome.jobState,
				uploads: outcome.uploads.map(summarizeUpload),
			});
		case "Aborted":
			return formatErrorResponse({
				code: outcome.error._tag,
				message: outcome.error.message,
				details: {
					runId: outcome.runId,
					phase: outcome.phase,
					jobId: outcome.jobId,
					uploads: outcome.uploads.map(summarizeUpload),
				},
			});
	}
};
