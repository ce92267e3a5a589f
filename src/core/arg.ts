// CHANGE: Input unit consumed by the matcher (user token or boundary sentinel)
// PURITY: CORE
// INVARIANT: Sentinels carry no text; unwrapUser on a sentinel is a contract violation
// COMPLEXITY: O(1) per argument, O(n) for argsFromArgv

import { Data } from "effect";

import { InvariantViolation } from "./errors.js";

/**
 * One step of input.
 *
 * - `User` - a literal argv element
 * - `EndOfInput` - the argv was fully consumed
 * - `EndOfPartialInput` - the argv is a prefix still being typed (completion)
 */
export type Arg = Data.TaggedEnum<{
	User: { readonly text: string };
	EndOfInput: {};
	EndOfPartialInput: {};
}>;

export const Arg = Data.taggedEnum<Arg>();

/**
 * Literal text of a user argument.
 *
 * @throws InvariantViolation when `arg` is a sentinel
 * @pure true
 */
export function unwrapUser(arg: Arg, where = "unwrapUser"): string {
	if (arg._tag === "User") return arg.text;
	throw new InvariantViolation({
		where,
		detail: `expected a user argument, received ${arg._tag}`,
	});
}

export const isSentinel = (arg: Arg): boolean => arg._tag !== "User";

/**
 * Build the argument sequence for an argv: one `User` per element, closed by
 * the end-of-input sentinel matching the kind of input.
 *
 * @example
 * ```ts
 * argsFromArgv(["cp", "-r"]);
 * // [User("cp"), User("-r"), EndOfInput]
 * ```
 */
export function argsFromArgv(
	argv: ReadonlyArray<string>,
	options: { readonly partial?: boolean } = {},
): ReadonlyArray<Arg> {
	const end =
		options.partial === true ? Arg.EndOfPartialInput() : Arg.EndOfInput();
	return [...argv.map((text) => Arg.User({ text })), end];
}
