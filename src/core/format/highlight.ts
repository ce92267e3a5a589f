// CHANGE: Pure highlight ranges for argv diagnostics, derived from recorded tokens
// PURITY: CORE
// INVARIANT: 0 ≤ start ≤ end ≤ |argv[segmentIndex]| for every resolved range
// COMPLEXITY: O(t) where t = |tokens|

import { match } from "ts-pattern";

import type { Slice, Token } from "../models.js";

export type HighlightKind = "option" | "assign" | "value";

export interface HighlightRange {
	readonly kind: HighlightKind;
	readonly start: number;
	readonly end: number;
}

const kindOf = (token: Token): HighlightKind =>
	match(token)
		.with({ _tag: "Option" }, () => "option" as const)
		.with({ _tag: "Assign" }, () => "assign" as const)
		.with({ _tag: "Value" }, () => "value" as const)
		.exhaustive();

const clamp = (value: number, max: number): number =>
	Math.max(0, Math.min(value, max));

/**
 * Resolve the character range a token covers inside its argv element.
 *
 * A token without slice stands for the whole element. Ranges are clamped to
 * the element so a renderer can index the text directly.
 *
 * @param token - recorded token
 * @param argv - the original argument list
 * @returns [start, end) range, empty when the element does not exist
 *
 * @pure true
 * @invariant 0 ≤ start ≤ end ≤ argv[token.segmentIndex].length
 * @complexity O(1)
 */
export function resolveTokenRange(
	token: Token,
	argv: ReadonlyArray<string>,
): HighlightRange {
	const length = argv[token.segmentIndex]?.length ?? 0;
	const slice: Slice = token.slice ?? [0, length];
	const start = clamp(slice[0], length);
	const end = Math.max(start, clamp(slice[1], length));
	return { kind: kindOf(token), start, end };
}

/**
 * Ranges of every token recorded for one argv element, in token order.
 *
 * @pure true
 * @example
 * ```ts
 * // tokens recorded by PushBound on "--name=value"
 * highlightSegment(state.tokens, ["--name=value"], 0);
 * // [{kind:"option",start:0,end:6}, {kind:"assign",start:6,end:7}, {kind:"value",start:7,end:12}]
 * ```
 */
export function highlightSegment(
	tokens: ReadonlyArray<Token>,
	argv: ReadonlyArray<string>,
	segmentIndex: number,
): ReadonlyArray<HighlightRange> {
	return tokens
		.filter((token) => token.segmentIndex === segmentIndex)
		.map((token) => resolveTokenRange(token, argv));
}

/**
 * Check that tokens were recorded during a single linear scan.
 *
 * @pure true
 * @invariant result ⇔ ∀ i: tokens[i].segmentIndex ≤ tokens[i+1].segmentIndex
 */
export const tokensAreOrdered = (tokens: ReadonlyArray<Token>): boolean =>
	tokens.every(
		(token, i) => i === 0 || (tokens[i - 1]?.segmentIndex ?? 0) <= token.segmentIndex,
	);
