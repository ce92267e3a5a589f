// CHANGE: Public API entry point for library consumers (transition engines)
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are pure functions, immutable data, or Effect programs
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// CORE DATA MODEL
// ═══════════════════════════════════════════════════════════════════════════════

export { Arg, argsFromArgv, isSentinel, unwrapUser } from "./core/arg.js";
export { type CoreError, InvariantViolation, isCoreError } from "./core/errors.js";
export {
	applySome,
	hasError,
	makeRunState,
	type OptionEntry,
	OptionValue,
	type PartialRunState,
	Positional,
	type RunState,
	type Slice,
	Token,
} from "./core/models.js";
export {
	AMBIGUOUS_COMMAND_INDEX,
	HELP_COMMAND_INDEX,
	Selection,
	selectionFromIndex,
	selectionToIndex,
	UNMATCHED_COMMAND_INDEX,
} from "./core/selection.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CHECKS AND REDUCERS
// ═══════════════════════════════════════════════════════════════════════════════

export { applyCheck, Check, isBatch, isValidOption } from "./core/checks.js";
export {
	applyReducer,
	formatErrorMessage,
	HELP_REDIRECT_OPTION,
	Reducer,
} from "./core/reducers.js";

/**
 * Character ranges of recorded tokens, for caret-style diagnostics.
 *
 * @pure true
 */
export {
	type HighlightKind,
	type HighlightRange,
	highlightSegment,
	resolveTokenRange,
	tokensAreOrdered,
} from "./core/format/highlight.js";

// ═══════════════════════════════════════════════════════════════════════════════
// EFFECT BOUNDARY
// ═══════════════════════════════════════════════════════════════════════════════

export {
	applyCheckEffect,
	applyReducerEffect,
	type Edge,
	forkEffect,
	stepEffect,
} from "./app/step.js";
export {
	type MatcherConfig,
	matcherConfig,
	withMatcherLogging,
} from "./shell/config/index.js";
