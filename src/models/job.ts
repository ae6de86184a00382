import { Schema } from "effect";

/**
 * Default analysis model sent in every job's parameters
 */
export const DEFAULT_MODEL = "saaras:v2";

/**
 * Terminal job states. Every other job_state value means "keep polling".
 */
export const JOB_STATE_COMPLETED = "Completed";
export const JOB_STATE_FAILED = "Failed";

/**
 * Answer types understood by the analytics API (wire values)
 */
export const QuestionType = Schema.Literal(
	"short answer",
	"long answer",
	"boolean",
	"enum",
	"number",
);
export type QuestionType = typeof QuestionType.Type;

/**
 * A question asked of every audio file in the batch.
 * Ids are assigned by the caller and must be stable within a run ("q1", "q2", ...).
 * Questions with blank text are accepted but never sent to the job.
 */
export const Question = Schema.Struct({
	id: Schema.String.pipe(Schema.minLength(1)),
	text: Schema.String,
	type: QuestionType,
	description: Schema.optionalWith(Schema.String, { exact: true }),
});
export type Question = typeof Question.Type;

/**
 * job_parameters payload of POST /job
 */
export const JobParameters = Schema.Struct({
	model: Schema.String,
	with_diarization: Schema.Boolean,
	num_speakers: Schema.Number.pipe(Schema.int(), Schema.positive()),
	questions: Schema.Array(
		Schema.Struct({
			id: Schema.String,
			text: Schema.String,
			type: QuestionType,
			description: Schema.String,
		}),
	),
});
export type JobParameters = typeof JobParameters.Type;

/**
 * Body of a 202 from POST /job/init
 */
export const InitJobResponse = Schema.Struct({
	job_id: Schema.String,
	input_storage_path: Schema.String,
	output_storage_path: Schema.String,
});

/**
 * Job created by init: its id plus the SAS-scoped input and output locations
 */
export interface JobHandle {
	readonly jobId: string;
	readonly inputStoragePath: string;
	readonly outputStoragePath: string;
}

/**
 * Body of a 200 from GET /job/{job_id}/status
 */
export const JobStatus = Schema.Struct({
	job_state: Schema.String,
});
export type JobStatus = typeof JobStatus.Type;

/**
 * Responses come back as strings for text questions but as JSON numbers or
 * booleans for "number" and "boolean" questions.
 */
const ResponseText = Schema.transform(
	Schema.Union(Schema.String, Schema.Number, Schema.Boolean),
	Schema.String,
	{
		strict: true,
		decode: (value) => String(value),
		encode: (text) => text,
	},
);

export const Answer = Schema.Struct({
	question: Schema.String,
	response: ResponseText,
	reasoning: Schema.optionalWith(Schema.String, { default: () => "" }),
});
export type Answer = typeof Answer.Type;

/**
 * Content of one .json file in the job's output directory
 */
export const AnalysisResult = Schema.Struct({
	transcript: Schema.String,
	diarized_transcript: Schema.optionalWith(Schema.String, { exact: true }),
	answers: Schema.optionalWith(Schema.Array(Answer), { default: () => [] }),
});
export type AnalysisResult = typeof AnalysisResult.Type;

/**
 * Decodes a result file's UTF-8 text into an AnalysisResult
 */
export const AnalysisResultFromJson = Schema.parseJson(AnalysisResult);

/**
 * An audio file to upload, keyed by the name it will have in storage
 */
export interface NamedBlob {
	readonly name: string;
	readonly data: Uint8Array;
}

/**
 * Everything a caller supplies for one batch run
 */
export interface BatchRequest {
	readonly files: ReadonlyArray<NamedBlob>;
	readonly questions: ReadonlyArray<Question>;
	readonly withDiarization: boolean;
	readonly numSpeakers: number;
}

/**
 * A question as entered by a user, before ids are assigned
 */
export interface QuestionDraft {
	readonly text: string;
	readonly type: QuestionType;
	readonly description?: string;
}

/**
 * Turns ordered drafts into Questions.
 *
 * Drafts with blank text are dropped; ids follow each draft's position in the
 * original list, so the third draft is always "q3" even if the second was blank.
 */
export function buildQuestions(
	drafts: ReadonlyArray<QuestionDraft>,
): Question[] {
	const questions: Question[] = [];
	drafts.forEach((draft, index) => {
		const text = draft.text.trim();
		if (!text) {
			return;
		}
		const description = draft.description?.trim();
		questions.push({
			id: `q${index + 1}`,
			text,
			type: draft.type,
			...(description ? { description } : {}),
		});
	});
	return questions;
}

const hasText = (question: Question): boolean => question.text.trim() !== "";

/**
 * Builds the job_parameters payload for POST /job; blank questions are left out
 */
export function buildJobParameters(
	request: BatchRequest,
	model: string,
): JobParameters {
	return {
		model,
		with_diarization: request.withDiarization,
		num_speakers: request.numSpeakers,
		questions: request.questions.filter(hasText).map((question) => ({
			id: question.id,
			text: question.text,
			type: question.type,
			description: question.description ?? "",
		})),
	};
}
