// src/services/config.ts
import {
	Config,
	type ConfigError,
	Context,
	Duration,
	Layer,
	Redacted,
} from "effect";

import { DEFAULT_MODEL } from "../models/job";

/**
 * Runtime settings for the job API and storage clients.
 *
 * Loaded from the environment by `AnalyticsConfig.fromEnv`:
 * - CALL_ANALYTICS_API_KEY               (required)
 * - CALL_ANALYTICS_BASE_URL
 * - CALL_ANALYTICS_MODEL
 * - CALL_ANALYTICS_POLL_INTERVAL         e.g. "10 seconds"
 * - CALL_ANALYTICS_REQUEST_TIMEOUT       e.g. "30 seconds"
 * - CALL_ANALYTICS_MAX_STATUS_FAILURES
 * - CALL_ANALYTICS_UPLOAD_CONCURRENCY
 */

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_BASE_URL = "https://api.sarvam.ai/call-analytics/";

/** Fixed wait between status checks */
export const DEFAULT_POLL_INTERVAL = Duration.seconds(10);

/** Upper bound for any single HTTP or storage call */
export const DEFAULT_REQUEST_TIMEOUT = Duration.seconds(30);

/** 0 = the first failed status fetch aborts the run */
export const DEFAULT_MAX_STATUS_FAILURES = 0;

export const DEFAULT_UPLOAD_CONCURRENCY = 4;

// =============================================================================
// Service
// =============================================================================

export interface AnalyticsSettings {
	readonly baseUrl: string;
	readonly apiKey: Redacted.Redacted<string>;
	readonly model: string;
	readonly pollInterval: Duration.Duration;
	readonly requestTimeout: Duration.Duration;
	/** Consecutive failed status fetches tolerated before the run aborts */
	readonly maxStatusFailures: number;
	readonly uploadConcurrency: number;
}

/**
 * Explicit settings layered over the environment or the defaults
 */
export type SettingsOverrides = Partial<Omit<AnalyticsSettings, "apiKey">> & {
	readonly apiKey?: string | Redacted.Redacted<string>;
};

const toRedacted = (
	apiKey: string | Redacted.Redacted<string>,
): Redacted.Redacted<string> =>
	Redacted.isRedacted(apiKey) ? apiKey : Redacted.make(apiKey);

/**
 * Apply every override that is set; unset ones keep the base value
 */
export function mergeSettings(
	base: AnalyticsSettings,
	overrides: SettingsOverrides,
): AnalyticsSettings {
	return {
		baseUrl: overrides.baseUrl ?? base.baseUrl,
		apiKey:
			overrides.apiKey === undefined ? base.apiKey : toRedacted(overrides.apiKey),
		model: overrides.model ?? base.model,
		pollInterval: overrides.pollInterval ?? base.pollInterval,
		requestTimeout: overrides.requestTimeout ?? base.requestTimeout,
		maxStatusFailures: overrides.maxStatusFailures ?? base.maxStatusFailures,
		uploadConcurrency: overrides.uploadConcurrency ?? base.uploadConcurrency,
	};
}

const settingsConfig = (
	overrides: SettingsOverrides,
): Config.Config<AnalyticsSettings> =>
	Config.all({
		baseUrl: Config.string("CALL_ANALYTICS_BASE_URL").pipe(
			Config.withDefault(DEFAULT_BASE_URL),
		),
		// An explicit key means the environment need not carry one
		apiKey:
			overrides.apiKey === undefined
				? Config.redacted("CALL_ANALYTICS_API_KEY")
				: Config.succeed(toRedacted(overrides.apiKey)),
		model: Config.string("CALL_ANALYTICS_MODEL").pipe(
			Config.withDefault(DEFAULT_MODEL),
		),
		pollInterval: Config.duration("CALL_ANALYTICS_POLL_INTERVAL").pipe(
			Config.withDefault(DEFAULT_POLL_INTERVAL),
		),
		requestTimeout: Config.duration("CALL_ANALYTICS_REQUEST_TIMEOUT").pipe(
			Config.withDefault(DEFAULT_REQUEST_TIMEOUT),
		),
		maxStatusFailures: Config.integer("CALL_ANALYTICS_MAX_STATUS_FAILURES").pipe(
			Config.validate({
				message: "must be zero or greater",
				validation: (n) => n >= 0,
			}),
			Config.withDefault(DEFAULT_MAX_STATUS_FAILURES),
		),
		uploadConcurrency: Config.integer("CALL_ANALYTICS_UPLOAD_CONCURRENCY").pipe(
			Config.validate({
				message: "must be at least 1",
				validation: (n) => n >= 1,
			}),
			Config.withDefault(DEFAULT_UPLOAD_CONCURRENCY),
		),
	}).pipe(Config.map((env) => mergeSettings(env, overrides)));

/**
 * Effect Context tag for the analytics settings
 */
export class AnalyticsConfig extends Context.Tag("AnalyticsConfig")<
	AnalyticsConfig,
	AnalyticsSettings
>() {
	/**
	 * Reads settings from the active ConfigProvider (the environment by default)
	 */
	static readonly fromEnv: Layer.Layer<AnalyticsConfig, ConfigError.ConfigError> =
		Layer.effect(AnalyticsConfig, settingsConfig({}));

	/**
	 * Environment settings with `overrides` taking precedence
	 */
	static fromEnvWith(
		overrides: SettingsOverrides,
	): Layer.Layer<AnalyticsConfig, ConfigError.ConfigError> {
		return Layer.effect(AnalyticsConfig, settingsConfig(overrides));
	}

	/**
	 * Settings from explicit values; everything but the API key has a default
	 */
	static make(
		settings: SettingsOverrides & {
			apiKey: string | Redacted.Redacted<string>;
		},
	): Layer.Layer<AnalyticsConfig> {
		return Layer.succeed(AnalyticsConfig, resolveSettings(settings));
	}
}

/**
 * Fills defaults for any setting not given
 */
export function resolveSettings(
	settings: SettingsOverrides & {
		apiKey: string | Redacted.Redacted<string>;
	},
): AnalyticsSettings {
	return mergeSettings(
		{
			baseUrl: DEFAULT_BASE_URL,
			apiKey: toRedacted(settings.apiKey),
			model: DEFAULT_MODEL,
			pollInterval: DEFAULT_POLL_INTERVAL,
			requestTimeout: DEFAULT_REQUEST_TIMEOUT,
			maxStatusFailures: DEFAULT_MAX_STATUS_FAILURES,
			uploadConcurrency: DEFAULT_UPLOAD_CONCURRENCY,
		},
		settings,
	);
}
