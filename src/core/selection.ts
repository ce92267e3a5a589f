// CHANGE: Enumerated outcome for the command a state is a candidate for
// PURITY: CORE
// INVARIANT: selectionFromIndex(selectionToIndex(s)) ≡ s for every s except Help, whose command index travels in the help option
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Which declared command a RunState currently stands for.
 */
export type Selection = Data.TaggedEnum<{
	Command: { readonly index: number };
	Help: { readonly index: number };
	Ambiguous: {};
	Unmatched: {};
}>;

export const Selection = Data.taggedEnum<Selection>();

export const HELP_COMMAND_INDEX = -1;
export const AMBIGUOUS_COMMAND_INDEX = -2;
export const UNMATCHED_COMMAND_INDEX = -3;

/**
 * Integer encoding for engines that store the selection as a number.
 *
 * @pure true
 * @invariant result ≥ 0 ⇔ selection is Command
 */
export const selectionToIndex = (selection: Selection): number =>
	match(selection)
		.with({ _tag: "Command" }, ({ index }) => index)
		.with({ _tag: "Help" }, () => HELP_COMMAND_INDEX)
		.with({ _tag: "Ambiguous" }, () => AMBIGUOUS_COMMAND_INDEX)
		.with({ _tag: "Unmatched" }, () => UNMATCHED_COMMAND_INDEX)
		.exhaustive();

/**
 * Decode an integer selection. `helpTarget` is the command the help was
 * requested for; it is not part of the integer encoding.
 *
 * @pure true
 * @invariant non-integer indexes decode to Unmatched
 */
export function selectionFromIndex(index: number, helpTarget: number): Selection {
	if (!Number.isInteger(index)) return Selection.Unmatched();
	if (index >= 0) return Selection.Command({ index });
	if (index === HELP_COMMAND_INDEX) return Selection.Help({ index: helpTarget });
	if (index === AMBIGUOUS_COMMAND_INDEX) return Selection.Ambiguous();
	return Selection.Unmatched();
}
