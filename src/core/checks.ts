// CHANGE: Predicate library gating matcher transitions
// PURITY: CORE
// INVARIANT: applyCheck has no observable effect; it may be evaluated any number of times in any order
// COMPLEXITY: O(k) where k = |argument text|

import { Data } from "effect";
import { match } from "ts-pattern";

import { type Arg, unwrapUser } from "./arg.js";
import type { RunState } from "./models.js";

/**
 * Edge guard. Closed set: adding a variant fails `applyCheck` until handled.
 */
export type Check = Data.TaggedEnum<{
	Always: {};
	IsBatchOption: { readonly options: ReadonlySet<string> };
	IsBoundOption: { readonly options: ReadonlySet<string> };
	IsExact: { readonly value: string };
	IsExactString: { readonly value: string };
	IsHelp: {};
	IsNotOptionLike: {};
	IsOptionLike: {};
	IsUnsupportedOption: { readonly options: ReadonlySet<string> };
	IsInvalidOption: {};
}>;

export const Check = Data.taggedEnum<Check>();

const LONG_OPTION_BODY = /^[\p{Alphabetic}\p{N}-]*$/u;
const SHORT_OPTION_BODY = /^\p{Alphabetic}*$/u;
const BATCH_FLAG = /^[A-Za-z0-9]$/;

/**
 * Syntactic validity of an option token.
 *
 * - `--name`: every character after `--` is a letter, a digit or `-`
 * - `-x`: every character after `-` is a letter
 *
 * @pure true
 * @example
 * ```ts
 * isValidOption("--dry-run"); // true
 * isValidOption("-1");        // false
 * ```
 */
export function isValidOption(option: string): boolean {
	if (option.startsWith("--")) return LONG_OPTION_BODY.test(option.slice(2));
	if (option.startsWith("-")) return SHORT_OPTION_BODY.test(option.slice(1));
	return false;
}

/**
 * True when `text` is a bundle of known single-letter flags, e.g. `-rf`.
 *
 * @pure true
 */
export function isBatch(text: string, options: ReadonlySet<string>): boolean {
	if (!text.startsWith("-") || text.length <= 2) return false;
	return [...text.slice(1)].every(
		(flag) => BATCH_FLAG.test(flag) && options.has(`-${flag}`),
	);
}

const isHelpText = (text: string): boolean =>
	text === "--help" || text === "-h" || text.startsWith("--help=");

const isOptionLikeText = (text: string): boolean =>
	text !== "-" && text.startsWith("-");

const boundName = (text: string): string | undefined => {
	const eq = text.indexOf("=");
	return eq === -1 ? undefined : text.slice(0, eq);
};

/**
 * Evaluate `check` against the current state and argument.
 *
 * Every check but `Always` reads the argument text, so the engine must not
 * route a sentinel into them.
 *
 * @throws InvariantViolation when a text check receives a sentinel
 * @pure true
 */
export function applyCheck(
	check: Check,
	state: RunState,
	arg: Arg,
	_segmentIndex: number,
): boolean {
	const text = (): string => unwrapUser(arg, `applyCheck(${check._tag})`);
	const options = !state.ignoreOptions;

	return match<Check, boolean>(check)
		.with({ _tag: "Always" }, () => true)
		.with({ _tag: "IsBatchOption" }, (c) => {
			const value = text();
			return options && isBatch(value, c.options);
		})
		.with({ _tag: "IsBoundOption" }, (c) => {
			const name = boundName(text());
			return options && name !== undefined && c.options.has(name);
		})
		.with({ _tag: "IsExact" }, { _tag: "IsExactString" }, (c) => {
			const value = text();
			return options && value === c.value;
		})
		.with({ _tag: "IsHelp" }, () => {
			const value = text();
			return options && isHelpText(value);
		})
		.with({ _tag: "IsNotOptionLike" }, () => {
			const value = text();
			return !options || !isOptionLikeText(value);
		})
		.with({ _tag: "IsOptionLike" }, () => {
			const value = text();
			return options && isOptionLikeText(value);
		})
		.with({ _tag: "IsUnsupportedOption" }, (c) => {
			const value = text();
			return (
				options &&
				value.startsWith("-") &&
				isValidOption(value) &&
				!c.options.has(value)
			);
		})
		.with({ _tag: "IsInvalidOption" }, () => {
			const value = text();
			return options && value.startsWith("-") && !isValidOption(value);
		})
		.exhaustive();
}
