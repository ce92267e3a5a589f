// CHANGE: Matcher logging configuration read from the environment
// PURITY: SHELL (reads the ambient ConfigProvider)
// EFFECT: Effect<MatcherConfig, ConfigError>
// INVARIANT: trace = true ⇒ logLevel = Debug
// COMPLEXITY: O(1)

import { Config, Effect, Logger, LogLevel } from "effect";

/**
 * Settings for the APP layer logger.
 */
export interface MatcherConfig {
	readonly logLevel: LogLevel.LogLevel;
	readonly trace: boolean;
}

export const LOG_LEVEL_KEY = "ARGMATCH_LOG_LEVEL";
export const TRACE_KEY = "ARGMATCH_TRACE";

/**
 * `ARGMATCH_LOG_LEVEL` (default Warning) and `ARGMATCH_TRACE` (default false).
 */
export const matcherConfig: Config.Config<MatcherConfig> = Config.all({
	logLevel: Config.logLevel(LOG_LEVEL_KEY).pipe(
		Config.withDefault(LogLevel.Warning),
	),
	trace: Config.boolean(TRACE_KEY).pipe(Config.withDefault(false)),
}).pipe(
	Config.map(({ logLevel, trace }) => ({
		logLevel: trace ? LogLevel.Debug : logLevel,
		trace,
	})),
);

/**
 * Run `program` with the minimum log level taken from configuration.
 *
 * @effect Effect<A, E | ConfigError, R>
 *
 * @example
 * ```ts
 * Effect.runSync(withMatcherLogging(forkEffect(edges, state, arg, 0)));
 * ```
 */
export const withMatcherLogging = <A, E, R>(
	program: Effect.Effect<A, E, R>,
) =>
	Effect.flatMap(matcherConfig, ({ logLevel }) =>
		program.pipe(Logger.withMinimumLogLevel(logLevel)),
	);
