// CHANGE: Effect boundary between a transition engine and the check/reducer core
// PURITY: APP (logging only; no state is held between calls)
// EFFECT: Effect<Option<RunState>, InvariantViolation>
// INVARIANT: Successor states never alias each other or their ancestor
// COMPLEXITY: O(e · n) for forkEffect where e = |edges|, n = reducer cost

import { Effect, Option } from "effect";

import type { Arg } from "../core/arg.js";
import { applyCheck, type Check } from "../core/checks.js";
import { type CoreError, isCoreError } from "../core/errors.js";
import type { RunState } from "../core/models.js";
import { applyReducer, type Reducer } from "../core/reducers.js";

/**
 * Transition label: the guard and the action of one engine edge.
 */
export interface Edge {
	readonly check: Check;
	readonly reducer: Reducer;
}

/**
 * Lift a core call into Effect. Core errors go to the error channel; any
 * other throw is a defect.
 */
const liftCore = <A>(run: () => A): Effect.Effect<A, CoreError> =>
	Effect.try({
		try: run,
		catch: (error) => error,
	}).pipe(
		Effect.catchAll((error) =>
			isCoreError(error) ? Effect.fail(error) : Effect.die(error),
		),
	);

/**
 * Evaluate a check.
 *
 * @effect Effect<boolean, InvariantViolation>
 * @pure false (fails instead of throwing)
 */
export const applyCheckEffect = (
	check: Check,
	state: RunState,
	arg: Arg,
	segmentIndex: number,
): Effect.Effect<boolean, CoreError> =>
	liftCore(() => applyCheck(check, state, arg, segmentIndex));

/**
 * Apply a reducer.
 *
 * @effect Effect<RunState, InvariantViolation>
 */
export const applyReducerEffect = (
	reducer: Reducer,
	state: RunState,
	arg: Arg,
	segmentIndex: number,
): Effect.Effect<RunState, CoreError> =>
	liftCore(() => applyReducer(reducer, state, arg, segmentIndex));

/**
 * Take one edge: run the reducer when the check holds.
 *
 * @returns Some(next state) when the edge is viable, None otherwise
 *
 * @effect Effect<Option<RunState>, InvariantViolation>
 * @invariant None ⇒ reducer was not evaluated
 *
 * @example
 * ```ts
 * const next = Effect.runSync(
 *   stepEffect(
 *     { check: Check.IsOptionLike(), reducer: Reducer.PushTrue({ name: "-v" }) },
 *     makeRunState(),
 *     Arg.User({ text: "-v" }),
 *     0,
 *   ),
 * );
 * ```
 */
export const stepEffect = (
	edge: Edge,
	state: RunState,
	arg: Arg,
	segmentIndex: number,
): Effect.Effect<Option.Option<RunState>, CoreError> =>
	Effect.gen(function* () {
		const viable = yield* applyCheckEffect(edge.check, state, arg, segmentIndex);
		yield* Effect.logDebug(viable ? "edge taken" : "edge rejected");
		if (!viable) return Option.none();

		const next = yield* applyReducerEffect(edge.reducer, state, arg, segmentIndex);
		if (next.errorMessage !== undefined && state.errorMessage === undefined) {
			yield* Effect.logDebug("candidate failed").pipe(
				Effect.annotateLogs("error", next.errorMessage),
			);
		}
		return Option.some(next);
	}).pipe(
		Effect.annotateLogs({
			check: edge.check._tag,
			reducer: edge.reducer._tag,
			segment: segmentIndex,
			arg: arg._tag === "User" ? arg.text : arg._tag,
		}),
	);

/**
 * Evaluate several edges against the same ancestor and keep every viable
 * successor, in edge order.
 *
 * @effect Effect<RunState[], InvariantViolation>
 * @invariant ∀ i ≠ j: result[i] !== result[j] ∧ result[i] !== state
 */
export const forkEffect = (
	edges: ReadonlyArray<Edge>,
	state: RunState,
	arg: Arg,
	segmentIndex: number,
): Effect.Effect<ReadonlyArray<RunState>, CoreError> =>
	Effect.forEach(edges, (edge) => stepEffect(edge, state, arg, segmentIndex)).pipe(
		Effect.map((results) => results.flatMap((next) => Option.toArray(next))),
		Effect.tap((successors) =>
			Effect.logDebug(`${successors.length}/${edges.length} edges viable`),
		),
	);
