// CHANGE: Unit tests for matcher configuration
// WHY: Ensure log level and trace flags are read from the environment with defaults
// INVARIANT: trace = true ⇒ logLevel = Debug

import { ConfigProvider, Effect } from "effect";
import { describe, expect, it } from "vitest";

import {
	LOG_LEVEL_KEY,
	matcherConfig,
	TRACE_KEY,
	withMatcherLogging,
} from "../../../src/shell/config/index.js";
import { captureLogs } from "../../utils/logs.js";

const withEnv =
	(values: Record<string, string>) =>
	<A, E, R>(program: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
		Effect.withConfigProvider(
			program,
			ConfigProvider.fromMap(new Map(Object.entries(values))),
		);

describe("matcherConfig", () => {
	it("defaults to Warning without tracing", () => {
		const config = Effect.runSync(matcherConfig.pipe(withEnv({})));
		expect(config.logLevel._tag).toBe("Warning");
		expect(config.trace).toBe(false);
	});

	it("reads the log level", () => {
		const config = Effect.runSync(
			matcherConfig.pipe(withEnv({ [LOG_LEVEL_KEY]: "Error" })),
		);
		expect(config.logLevel._tag).toBe("Error");
	});

	it("forces Debug when tracing", () => {
		const config = Effect.runSync(
			matcherConfig.pipe(
				withEnv({ [LOG_LEVEL_KEY]: "Error", [TRACE_KEY]: "true" }),
			),
		);
		expect(config.logLevel._tag).toBe("Debug");
		expect(config.trace).toBe(true);
	});

	it("fails on an unknown log level", () => {
		const exit = Effect.runSyncExit(
			matcherConfig.pipe(withEnv({ [LOG_LEVEL_KEY]: "Loud" })),
		);
		expect(exit._tag).toBe("Failure");
	});
});

describe("withMatcherLogging", () => {
	it("drops debug logs by default", () => {
		const { entries, layer } = captureLogs();
		Effect.runSync(
			withMatcherLogging(Effect.logDebug("step")).pipe(
				withEnv({}),
				Effect.provide(layer),
			),
		);
		expect(entries).toEqual([]);
	});

	it("emits debug logs when tracing", () => {
		const { entries, layer } = captureLogs();
		Effect.runSync(
			withMatcherLogging(Effect.logDebug("step")).pipe(
				withEnv({ [TRACE_KEY]: "true" }),
				Effect.provide(layer),
			),
		);
		expect(entries.map((entry) => entry.message)).toEqual(["step"]);
	});
});
