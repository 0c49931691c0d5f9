// CHANGE: Pure decision function mapping an invocation outcome to an exit code
// FORMAT THEOREM: ∀s ∈ State: s.failed ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from the outcome of one invocation.
 *
 * @param state - Whether any step reported an error
 * @returns 1 if the invocation failed; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ failed: true }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(state, (s): ExitCode => (s.failed ? 1 : 0));

export const EXIT_SUCCESS: ExitCode = computeExitCode({ failed: false });
export const EXIT_FAILURE: ExitCode = computeExitCode({ failed: true });
