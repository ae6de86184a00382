// src/services/telemetry.ts
/**
 * Wide Event / Canonical Log Line implementation
 *
 * Instead of scattered log lines, we emit ONE comprehensive event per batch
 * run (and per MCP tool call) with all context.
 *
 * Builders accumulate context; `emitEvent` writes the finalized event as a
 * single JSON line.
 */

const SERVICE = "call-analytics-batch";
const VERSION = "1.0.0";

/**
 * Wide event structure for MCP tool calls
 */
export interface ToolCallEvent {
	// Identifiers
	timestamp: string;
	requestId: string;
	tool: string;

	// Service info
	service: typeof SERVICE;
	version: string;

	// Timing
	durationMs?: number;
	phases?: Record<string, number>; // phase name -> duration in ms

	// Outcome
	outcome: "success" | "error";

	// Error details (if outcome === "error")
	error?: {
		type: string;
		code: string;
		message: string;
		retriable: boolean;
	};

	// Additional context
	metadata?: Record<string, unknown>;
}

/**
 * Wide event structure for one batch run
 */
export interface BatchRunEvent {
	// Identifiers
	timestamp: string;
	runId: string;
	jobId?: string;

	// Service info
	service: typeof SERVICE;
	version: string;

	// Timing
	durationMs?: number;
	phases?: Record<string, number>; // phase name -> duration in ms

	// Outcome: job completed, job failed remotely, or run aborted locally
	outcome: "completed" | "failed" | "aborted";

	// Error details
	error?: {
		type: string;
		code: string;
		message: string;
		phase: string;
		retriable: boolean;
	};

	// Counters
	files?: number;
	uploadFailures?: number;
	statusChecks?: number;
	results?: number;
	skippedResults?: number;
	eventHandlerFailures?: number;

	// Additional context
	metadata?: Record<string, unknown>;
}

/**
 * Mutable event builder - accumulates context throughout a tool call
 */
export class ToolCallEventBuilder {
	private event: ToolCallEvent;
	private startTime: number;
	private phaseStartTimes: Map<string, number> = new Map();

	constructor(tool: string, requestId: string) {
		this.startTime = Date.now();
		this.event = {
			tool,
			requestId,
			timestamp: new Date().toISOString(),
			service: SERVICE,
			version: VERSION,
			outcome: "success",
		};
	}

	startPhase(phase: string): this {
		this.phaseStartTimes.set(phase, Date.now());
		return this;
	}

	endPhase(phase: string): this {
		const startTime = this.phaseStartTimes.get(phase);
		if (startTime !== undefined) {
			this.event.phases = {
				...this.event.phases,
				[phase]: Date.now() - startTime,
			};
			this.phaseStartTimes.delete(phase);
		}
		return this;
	}

	setError(error: ToolCallEvent["error"]): this {
		this.event.error = error;
		this.event.outcome = "error";
		return this;
	}

	setMetadata(metadata: Record<string, unknown>): this {
		this.event.metadata = { ...this.event.metadata, ...metadata };
		return this;
	}

	finalize(): ToolCallEvent {
		this.event.durationMs = Date.now() - this.startTime;
		return this.event;
	}
}

type BatchCounter =
	| "files"
	| "uploadFailures"
	| "statusChecks"
	| "results"
	| "skippedResults"
	| "eventHandlerFailures";

/**
 * Batch run event builder
 */
export class BatchRunEventBuilder {
	private event: BatchRunEvent;
	private startTime: number;
	private currentPhase: { name: string; startedAt: number } | null = null;

	constructor(runId: string) {
		this.startTime = Date.now();
		this.event = {
			runId,
			timestamp: new Date().toISOString(),
			service: SERVICE,
			version: VERSION,
			outcome: "completed",
		};
	}

	setJobId(jobId: string): this {
		this.event.jobId = jobId;
		return this;
	}

	/**
	 * Close the running phase (recording its duration) and open `name`
	 */
	enterPhase(name: string): this {
		this.closePhase();
		this.currentPhase = { name, startedAt: Date.now() };
		return this;
	}

	setCount(counter: BatchCounter, value: number): this {
		this.event[counter] = value;
		return this;
	}

	setOutcome(outcome: BatchRunEvent["outcome"]): this {
		this.event.outcome = outcome;
		return this;
	}

	setError(error: BatchRunEvent["error"]): this {
		this.event.error = error;
		this.event.outcome = "aborted";
		return this;
	}

	setMetadata(metadata: Record<string, unknown>): this {
		this.event.metadata = { ...this.event.metadata, ...metadata };
		return this;
	}

	finalize(): BatchRunEvent {
		this.closePhase();
		this.event.durationMs = Date.now() - this.startTime;
		return this.event;
	}

	private closePhase(): void {
		if (this.currentPhase) {
			const duration = Date.now() - this.currentPhase.startedAt;
			this.event.phases = {
				...this.event.phases,
				[this.currentPhase.name]: duration,
			};
			this.currentPhase = null;
		}
	}
}

export type EventSink = (level: "info" | "error", line: string) => void;

const consoleSink: EventSink = (level, line) => {
	if (level === "error") {
		console.error(line);
	} else {
		console.log(line);
	}
};

let sink: EventSink = consoleSink;

/**
 * Redirect event lines, e.g. to stderr when stdout carries a protocol.
 * Returns the previous sink.
 */
export function setEventSink(next: EventSink): EventSink {
	const previous = sink;
	sink = next;
	return previous;
}

/**
 * Write a finalized event as one JSON log line
 */
export function emitEvent(
	level: "info" | "error",
	type: "batch.run" | "tool.call",
	event: BatchRunEvent | ToolCallEvent,
): void {
	sink(level, JSON.stringify({ level, type, ...event }));
}
