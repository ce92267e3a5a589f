// CHANGE: Unit tests for Arg helpers and argv conversion
// WHY: Ensure sentinels are never unwrapped as user text
// INVARIANT: unwrapUser(a) succeeds ⇔ a is User

import { Equal } from "effect";
import { describe, expect, it } from "vitest";

import {
	Arg,
	argsFromArgv,
	isSentinel,
	unwrapUser,
} from "../../src/core/arg.js";
import { InvariantViolation } from "../../src/core/errors.js";

describe("unwrapUser", () => {
	it("returns the literal text of a user argument", () => {
		expect(unwrapUser(Arg.User({ text: "--force" }))).toBe("--force");
	});

	it("throws InvariantViolation on the end-of-input sentinel", () => {
		expect(() => unwrapUser(Arg.EndOfInput())).toThrow(InvariantViolation);
	});

	it("names the caller and the sentinel in the violation", () => {
		try {
			unwrapUser(Arg.EndOfPartialInput(), "PushPath");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(InvariantViolation);
			if (error instanceof InvariantViolation) {
				expect(error.where).toBe("PushPath");
				expect(error.detail).toBe(
					"expected a user argument, received EndOfPartialInput",
				);
			}
		}
	});
});

describe("isSentinel", () => {
	it("distinguishes sentinels from user input", () => {
		expect(isSentinel(Arg.User({ text: "" }))).toBe(false);
		expect(isSentinel(Arg.EndOfInput())).toBe(true);
		expect(isSentinel(Arg.EndOfPartialInput())).toBe(true);
	});
});

describe("argsFromArgv", () => {
	it("closes a complete argv with EndOfInput", () => {
		const args = argsFromArgv(["cp", "-r"]);
		expect(args.map((arg) => arg._tag)).toEqual([
			"User",
			"User",
			"EndOfInput",
		]);
		expect(args[1] && unwrapUser(args[1])).toBe("-r");
	});

	it("closes a partial argv with EndOfPartialInput", () => {
		const args = argsFromArgv([], { partial: true });
		expect(args).toHaveLength(1);
		expect(args[0]?._tag).toBe("EndOfPartialInput");
	});

	it("builds structurally equal arguments for equal text", () => {
		const [first] = argsFromArgv(["x"]);
		expect(first && Equal.equals(first, Arg.User({ text: "x" }))).toBe(true);
	});
});
