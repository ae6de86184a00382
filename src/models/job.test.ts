import { Either, Schema } from "effect";
import { describe, expect, it } from "vitest";

import {
	AnalysisResultFromJson,
	type BatchRequest,
	buildJobParameters,
	buildQuestions,
	DEFAULT_MODEL,
	JobParameters,
	Question,
} from "./job";

describe("Job Models", () => {
	describe("buildQuestions", () => {
		it("should assign ids by position and skip blank drafts", () => {
			const questions = buildQuestions([
				{ text: "What is the issue?", type: "short answer" },
				{ text: "   ", type: "boolean" },
				{ text: "Was it resolved?", type: "boolean", description: " yes or no " },
			]);

			expect(questions).toEqual([
				{ id: "q1", text: "What is the issue?", type: "short answer" },
				{
					id: "q3",
					text: "Was it resolved?",
					type: "boolean",
					description: "yes or no",
				},
			]);
		});

		it("should drop blank descriptions", () => {
			const [question] = buildQuestions([
				{ text: "Rate the call", type: "number", description: "  " },
			]);

			expect(question).toEqual({ id: "q1", text: "Rate the call", type: "number" });
		});

		it("should return no questions for no drafts", () => {
			expect(buildQuestions([])).toEqual([]);
		});
	});

	describe("Question", () => {
		it("should reject an unknown question type", () => {
			const result = Schema.decodeUnknownEither(Question)({
				id: "q1",
				text: "Mood?",
				type: "sentiment",
			});

			expect(Either.isLeft(result)).toBe(true);
		});

		it("should accept empty question text", () => {
			const result = Schema.decodeUnknownEither(Question)({
				id: "q1",
				text: "",
				type: "long answer",
			});

			expect(Either.isRight(result)).toBe(true);
		});
	});

	describe("buildJobParameters", () => {
		const request: BatchRequest = {
			files: [{ name: "a.wav", data: new Uint8Array([1]) }],
			questions: [
				{ id: "q1", text: "What is the issue?", type: "short answer" },
				{ id: "q2", text: "Category", type: "enum", description: "billing|tech" },
			],
			withDiarization: true,
			numSpeakers: 2,
		};

		it("should build the wire payload with empty descriptions filled in", () => {
			expect(buildJobParameters(request, DEFAULT_MODEL)).toEqual({
				model: "saaras:v2",
				with_diarization: true,
				num_speakers: 2,
				questions: [
					{
						id: "q1",
						text: "What is the issue?",
						type: "short answer",
						description: "",
					},
					{
						id: "q2",
						text: "Category",
						type: "enum",
						description: "billing|tech",
					},
				],
			});
		});

		it("should leave blank questions out of the payload", () => {
			const payload = buildJobParameters(
				{
					...request,
					questions: [
						{ id: "q1", text: "", type: "short answer" },
						{ id: "q2", text: "   ", type: "boolean" },
						{ id: "q3", text: "Why?", type: "long answer" },
					],
				},
				DEFAULT_MODEL,
			);

			expect(payload.questions).toEqual([
				{ id: "q3", text: "Why?", type: "long answer", description: "" },
			]);
		});

				it("should produce a payload the wire schema accepts", () => {
			const payload = buildJobParameters(request, "custom-model");

			expect(Either.isRight(Schema.validateEither(JobParameters)(payload))).toBe(
				true,
			);
			expect(payload.model).toBe("custom-model");
		});
	});

	describe("AnalysisResultFromJson", () => {
		const decode = Schema.decodeUnknownEither(AnalysisResultFromJson);

		it("should decode a result file", () => {
			const result = decode(
				JSON.stringify({
					transcript: "hello",
					answers: [
						{
							question: "What is the issue?",
							response: "billing",
							reasoning: "caller said billing",
						},
					],
				}),
			);

			expect(Either.isRight(result)).toBe(true);
			if (Either.isRight(result)) {
				expect(result.right.transcript).toBe("hello");
				expect(result.right.answers).toEqual([
					{
						question: "What is the issue?",
						response: "billing",
						reasoning: "caller said billing",
					},
				]);
				expect(result.right.diarized_transcript).toBeUndefined();
			}
		});

		it("should default missing answers and reasoning", () => {
			const result = decode(
				JSON.stringify({
					transcript: "hi",
					diarized_transcript: "SPEAKER_1: hi",
				}),
			);

			expect(Either.isRight(result)).toBe(true);
			if (Either.isRight(result)) {
				expect(result.right.answers).toEqual([]);
				expect(result.right.diarized_transcript).toBe("SPEAKER_1: hi");
			}
		});

		it("should turn number and boolean responses into text", () => {
			const result = decode(
				JSON.stringify({
					transcript: "t",
					answers: [
						{ question: "Rating", response: 4 },
						{ question: "Resolved", response: false },
					],
				}),
			);

			expect(Either.isRight(result)).toBe(true);
			if (Either.isRight(result)) {
				expect(result.right.answers).toEqual([
					{ question: "Rating", response: "4", reasoning: "" },
					{ question: "Resolved", response: "false", reasoning: "" },
				]);
			}
		});

		it("should reject invalid JSON", () => {
			expect(Either.isLeft(decode("{not json"))).toBe(true);
		});

		it("should reject a result without a transcript", () => {
			expect(Either.isLeft(decode(JSON.stringify({ answers: [] })))).toBe(true);
		});
	});
});
