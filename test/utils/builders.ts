// CHANGE: Shared builders for matcher tests
// INVARIANT: Builders are pure and return fresh values on each call

import fc from "fast-check";

import { Arg } from "../../src/core/arg.js";
import {
	makeRunState,
	type OptionEntry,
	OptionValue,
	type PartialRunState,
	Positional,
	type RunState,
	Token,
} from "../../src/core/models.js";
import { Selection } from "../../src/core/selection.js";

export const user = (text: string): Arg => Arg.User({ text });

export const endOfInput = (): Arg => Arg.EndOfInput();

export const endOfPartialInput = (): Arg => Arg.EndOfPartialInput();

export const flag = (name: string, value = true): OptionEntry => [
	name,
	OptionValue.Bool({ value }),
];

export const pending = (name: string): OptionEntry => [name, OptionValue.None()];

export const stringOption = (name: string, value: string): OptionEntry => [
	name,
	OptionValue.String({ value }),
];

/** State with one pending option, as left by PushNone on an arity-1 option. */
export const stateWithPending = (
	name: string,
	over: PartialRunState = {},
): RunState => makeRunState({ options: [pending(name)], ...over });

/**
 * Deep, structure-only copy used to check that a call left its input intact.
 */
export const snapshotOf = (state: RunState): string => JSON.stringify(state);

const optionEntryArb: fc.Arbitrary<OptionEntry> = fc.tuple(
	fc.constantFrom("-r", "-f", "--name", "--out"),
	fc.oneof(
		fc.constant(OptionValue.None()),
		fc.boolean().map((value) => OptionValue.Bool({ value })),
		fc.string({ maxLength: 8 }).map((value) => OptionValue.String({ value })),
		fc
			.array(fc.string({ maxLength: 4 }), { maxLength: 3 })
			.map((values) => OptionValue.Array({ values })),
	),
);

const positionalArb: fc.Arbitrary<Positional> = fc.oneof(
	fc.string({ maxLength: 8 }).map((value) => Positional.Required({ value })),
	fc.string({ maxLength: 8 }).map((value) => Positional.Optional({ value })),
	fc.string({ maxLength: 8 }).map((value) => Positional.Rest({ value })),
);

const tokenArb: fc.Arbitrary<Token> = fc.oneof(
	fc.nat(5).map((segmentIndex) => Token.Value({ segmentIndex })),
	fc
		.nat(5)
		.map((segmentIndex) => Token.Option({ segmentIndex, option: "-r" })),
);

/** Arbitrary parse state with populated sequences. */
export const runStateArb: fc.Arbitrary<RunState> = fc
	.record({
		ignoreOptions: fc.boolean(),
		options: fc.array(optionEntryArb, { maxLength: 4 }),
		positionals: fc.array(positionalArb, { maxLength: 4 }),
		tokens: fc.array(tokenArb, { maxLength: 4 }),
		path: fc.array(fc.constantFrom("cp", "remote", "add"), { maxLength: 3 }),
		errorMessage: fc.option(fc.constant("Earlier failure."), { nil: undefined }),
		selectedIndex: fc.option(
			fc.nat(3).map((index) => Selection.Command({ index })),
			{ nil: undefined },
		),
	})
	.map((seed) => makeRunState(seed));

/** Arbitrary user argument or sentinel. */
export const argArb: fc.Arbitrary<Arg> = fc.oneof(
	fc.string({ maxLength: 10 }).map((text) => Arg.User({ text })),
	fc.constant(Arg.EndOfInput()),
	fc.constant(Arg.EndOfPartialInput()),
);
