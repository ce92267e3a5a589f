// CHANGE: Typed error ADT for contract violations raised by the matcher core
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`; user input errors never appear here
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Invariant violation - the compiled grammar scheduled an edge in a state
 * where it cannot run (a sentinel routed into a text-consuming edge, a value
 * attached with no pending option, ...).
 *
 * These are fatal for the matching attempt and never rendered to the user.
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 * @complexity O(1)
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Union type of all core errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type CoreError = InvariantViolation;

/**
 * Narrow an unknown thrown value to a core error.
 *
 * @pure true
 * @complexity O(1)
 */
export const isCoreError = (error: unknown): error is CoreError =>
	error instanceof InvariantViolation;
