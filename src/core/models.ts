// CHANGE: Parse-state domain models threaded through every matcher step (pure, immutable)
// PURITY: CORE
// INVARIANT: States are replaced, never mutated; sequences are ReadonlyArray and only ever rebuilt
// COMPLEXITY: O(1) construction, O(n) overlay where n = |overlaid sequences|

import { Data } from "effect";

import type { Selection } from "./selection.js";

/**
 * Value bound to an option occurrence.
 *
 * `None` marks an option that was recognized and is waiting for its value;
 * value-attaching reducers refine it into `String` or promote it to `Array`.
 */
export type OptionValue = Data.TaggedEnum<{
	None: {};
	Bool: { readonly value: boolean };
	String: { readonly value: string };
	Array: { readonly values: ReadonlyArray<string> };
}>;

export const OptionValue = Data.taggedEnum<OptionValue>();

/**
 * How a bare argument was classified when it was consumed.
 */
export type Positional = Data.TaggedEnum<{
	Required: { readonly value: string };
	Optional: { readonly value: string };
	Rest: { readonly value: string };
}>;

export const Positional = Data.taggedEnum<Positional>();

/**
 * Half-open range `[start, end)` inside one argv element, in UTF-16 code
 * units: the same indexes `String.prototype.slice` takes, so a renderer can
 * cut the element text with it directly.
 */
export type Slice = readonly [start: number, end: number];

/**
 * Diagnostic record of what part of which argv element was read, and as what.
 *
 * @remarks
 * - `segmentIndex` is the index of the argv element
 * - an absent `slice` means the token stands for the element as a whole, or
 *   for no scanned text (implicit options)
 */
export type Token = Data.TaggedEnum<{
	Option: {
		readonly segmentIndex: number;
		readonly slice?: Slice;
		readonly option: string;
	};
	Assign: { readonly segmentIndex: number; readonly slice: Slice };
	Value: { readonly segmentIndex: number; readonly slice?: Slice };
}>;

export const Token = Data.taggedEnum<Token>();

export type OptionEntry = readonly [name: string, value: OptionValue];

/**
 * Working parse state.
 *
 * @remarks
 * - @invariant tokens are non-decreasing in segmentIndex
 * - @invariant errorMessage is set at most once along a lineage
 * - @invariant options keep encounter order; a name may repeat
 */
export interface RunState {
	readonly ignoreOptions: boolean;
	readonly options: ReadonlyArray<OptionEntry>;
	readonly positionals: ReadonlyArray<Positional>;
	readonly tokens: ReadonlyArray<Token>;
	readonly path: ReadonlyArray<string>;
	readonly errorMessage?: string;
	readonly selectedIndex?: Selection;
}

/**
 * Sparse RunState: only the present fields are adopted by `applySome`.
 */
export type PartialRunState = Partial<RunState>;

/**
 * Initial state, optionally seeded.
 *
 * @pure true
 * @postcondition no array of the result is shared with `seed`
 */
export function makeRunState(seed: PartialRunState = {}): RunState {
	return applySome(
		{
			ignoreOptions: false,
			options: [],
			positionals: [],
			tokens: [],
			path: [],
		},
		seed,
	);
}

/**
 * Overlay the present fields of `partial` onto `state`.
 *
 * A field explicitly set to `undefined` counts as absent: an overlay sets
 * fields, it never clears them.
 *
 * @pure true
 * @invariant ∀ field ∉ partial: result[field] = state[field]
 * @complexity O(n) where n = total length of overlaid sequences
 */
export function applySome(
	state: RunState,
	partial: PartialRunState,
): RunState {
	const errorMessage = partial.errorMessage ?? state.errorMessage;
	const selectedIndex = partial.selectedIndex ?? state.selectedIndex;

	return {
		ignoreOptions: partial.ignoreOptions ?? state.ignoreOptions,
		options: partial.options ? [...partial.options] : state.options,
		positionals: partial.positionals
			? [...partial.positionals]
			: state.positionals,
		tokens: partial.tokens ? [...partial.tokens] : state.tokens,
		path: partial.path ? [...partial.path] : state.path,
		...(errorMessage === undefined ? {} : { errorMessage }),
		...(selectedIndex === undefined ? {} : { selectedIndex }),
	};
}

/**
 * True once a reducer recorded a user-facing error on this lineage.
 *
 * @pure true
 */
export const hasError = (state: RunState): boolean =>
	state.errorMessage !== undefined;
