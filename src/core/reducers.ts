// CHANGE: State-transforming operations run when a matcher transition fires
// PURITY: CORE
// FORMAT THEOREM: ∀ r, s, a, i: applyReducer(r, s, a, i) !== s ∧ s is unchanged afterwards
// INVARIANT: Reducers rebuild every sequence they touch; earlier states stay valid for sibling candidates
// COMPLEXITY: O(n) per call where n = |touched sequence|

import { Data } from "effect";
import { match } from "ts-pattern";

import { type Arg, unwrapUser } from "./arg.js";
import { InvariantViolation } from "./errors.js";
import {
	applySome,
	type OptionEntry,
	OptionValue,
	type PartialRunState,
	Positional,
	type RunState,
	Token,
} from "./models.js";
import type { Selection } from "./selection.js";

/**
 * Edge action. Closed set: adding a variant fails `applyReducer` until handled.
 */
export type Reducer = Data.TaggedEnum<{
	None: {};
	InhibateOptions: {};
	PushBatch: {};
	PushBound: {};
	PushExtra: {};
	PushFalse: { readonly name: string };
	PushNone: { readonly name: string };
	PushPath: {};
	PushPositional: {};
	PushRest: {};
	PushStringValue: {};
	PushTrue: { readonly name: string };
	SetCandidateState: { readonly state: PartialRunState };
	SetError: { readonly message: string };
	SetOptionArityError: {};
	SetSelectedIndex: { readonly selection: Selection };
	SetStringValue: {};
	UseHelp: { readonly index: number };
}>;

export const Reducer = Data.taggedEnum<Reducer>();

/**
 * Option name carrying a help redirection; its value is the command index.
 */
export const HELP_REDIRECT_OPTION = "-c";

function lastOption(state: RunState, where: string): OptionEntry {
	const last = state.options.at(-1);
	if (last === undefined) {
		throw new InvariantViolation({
			where,
			detail: "no option has been pushed yet",
		});
	}
	return last;
}

const replaceLast = (
	options: ReadonlyArray<OptionEntry>,
	entry: OptionEntry,
): ReadonlyArray<OptionEntry> => [...options.slice(0, -1), entry];

function pushOption(
	state: RunState,
	name: string,
	value: OptionValue,
	segmentIndex: number,
): RunState {
	return {
		...state,
		options: [...state.options, [name, value]],
		tokens: [...state.tokens, Token.Option({ segmentIndex, option: name })],
	};
}

function pushBatch(text: string, state: RunState, segmentIndex: number): RunState {
	const options: OptionEntry[] = [...state.options];
	const tokens: Token[] = [...state.tokens];

	for (let t = 1; t < text.length; t += 1) {
		const option = `-${text.charAt(t)}`;
		options.push([option, OptionValue.Bool({ value: true })]);
		tokens.push(
			Token.Option({
				segmentIndex,
				// The first flag owns the leading dash
				slice: t === 1 ? [0, 2] : [t, t + 1],
				option,
			}),
		);
	}

	return { ...state, options, tokens };
}

function pushBound(
	text: string,
	state: RunState,
	segmentIndex: number,
	where: string,
): RunState {
	const eq = text.indexOf("=");
	if (eq === -1) {
		throw new InvariantViolation({
			where,
			detail: `bound option without "=": ${text}`,
		});
	}
	const name = text.slice(0, eq);

	return {
		...state,
		options: [
			...state.options,
			[name, OptionValue.String({ value: text.slice(eq + 1) })],
		],
		tokens: [
			...state.tokens,
			Token.Option({ segmentIndex, slice: [0, eq], option: name }),
			Token.Assign({ segmentIndex, slice: [eq, eq + 1] }),
			Token.Value({ segmentIndex, slice: [eq + 1, text.length] }),
		],
	};
}

function pushStringValue(
	text: string,
	state: RunState,
	segmentIndex: number,
	where: string,
): RunState {
	const [name, current] = lastOption(state, where);

	const values = match(current)
		.with({ _tag: "None" }, () => [text])
		.with({ _tag: "Array" }, ({ values }) => [...values, text])
		.otherwise(({ _tag }) => {
			throw new InvariantViolation({
				where,
				detail: `cannot append a value to ${name}: expected None or Array, found ${_tag}`,
			});
		});

	return {
		...state,
		options: replaceLast(state.options, [
			name,
			OptionValue.Array({ values }),
		]),
		tokens: [...state.tokens, Token.Value({ segmentIndex })],
	};
}

function setStringValue(
	text: string,
	state: RunState,
	segmentIndex: number,
	where: string,
): RunState {
	const [name] = lastOption(state, where);

	return {
		...state,
		options: replaceLast(state.options, [
			name,
			OptionValue.String({ value: text }),
		]),
		tokens: [...state.tokens, Token.Value({ segmentIndex })],
	};
}

/**
 * User-facing message for `SetError`: sentinels have no text to quote.
 *
 * @pure true
 * @example
 * ```ts
 * formatErrorMessage("Unexpected value", Arg.User({ text: "x" }));
 * // 'Unexpected value ("x").'
 * ```
 */
export const formatErrorMessage = (message: string, arg: Arg): string =>
	arg._tag === "User" ? `${message} ("${arg.text}").` : `${message}.`;

/**
 * Produce the state that follows `state` when an edge labelled `reducer`
 * fires on `arg`.
 *
 * @throws InvariantViolation when the edge was scheduled in a state it cannot
 * run in (sentinel for a text reducer, missing or ill-typed last option)
 * @pure true
 * @postcondition result !== state; `state` and its sequences are unchanged
 */
export function applyReducer(
	reducer: Reducer,
	state: RunState,
	arg: Arg,
	segmentIndex: number,
): RunState {
	const where = `applyReducer(${reducer._tag})`;
	const text = (): string => unwrapUser(arg, where);

	return match<Reducer, RunState>(reducer)
		.with({ _tag: "None" }, () => ({ ...state }))
		.with({ _tag: "InhibateOptions" }, () => ({
			...state,
			ignoreOptions: true,
		}))
		.with({ _tag: "PushBatch" }, () => pushBatch(text(), state, segmentIndex))
		.with({ _tag: "PushBound" }, () =>
			pushBound(text(), state, segmentIndex, where),
		)
		.with({ _tag: "PushExtra" }, () => ({
			...state,
			positionals: [...state.positionals, Positional.Optional({ value: text() })],
		}))
		.with({ _tag: "PushPositional" }, () => ({
			...state,
			positionals: [...state.positionals, Positional.Required({ value: text() })],
		}))
		.with({ _tag: "PushRest" }, () => ({
			...state,
			positionals: [...state.positionals, Positional.Rest({ value: text() })],
		}))
		.with({ _tag: "PushFalse" }, ({ name }) =>
			pushOption(state, name, OptionValue.Bool({ value: false }), segmentIndex),
		)
		.with({ _tag: "PushTrue" }, ({ name }) =>
			pushOption(state, name, OptionValue.Bool({ value: true }), segmentIndex),
		)
		.with({ _tag: "PushNone" }, ({ name }) =>
			pushOption(state, name, OptionValue.None(), segmentIndex),
		)
		.with({ _tag: "PushPath" }, () => ({
			...state,
			path: [...state.path, text()],
		}))
		.with({ _tag: "PushStringValue" }, () =>
			pushStringValue(text(), state, segmentIndex, where),
		)
		.with({ _tag: "SetStringValue" }, () =>
			setStringValue(text(), state, segmentIndex, where),
		)
		.with({ _tag: "SetOptionArityError" }, () => {
			const [name] = lastOption(state, where);
			return {
				...state,
				errorMessage: `Not enough arguments to option ${name}.`,
			};
		})
		.with({ _tag: "SetError" }, ({ message }) => ({
			...state,
			errorMessage: formatErrorMessage(message, arg),
		}))
		.with({ _tag: "SetSelectedIndex" }, ({ selection }) => ({
			...state,
			selectedIndex: selection,
		}))
		.with({ _tag: "UseHelp" }, ({ index }) => ({
			...state,
			options: [
				[HELP_REDIRECT_OPTION, OptionValue.String({ value: String(index) })],
			],
		}))
		.with({ _tag: "SetCandidateState" }, (c) => applySome(state, c.state))
		.exhaustive();
}
