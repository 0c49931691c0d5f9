// CHANGE: Link invoker driving the engine and classifying each failure by step
// PURITY: APP
// EFFECT: Effect<void, ConfigurationError | FileOpenError | InputResolutionError | LinkEngineError>
// INVARIANT: a failing step stops the sequence; link() runs only if every input registered
// COMPLEXITY: O(n) where n = |plan|

import { Effect } from "effect";
import { match } from "ts-pattern";

import {
	ConfigurationError,
	type EngineFailure,
	FileOpenError,
	InputResolutionError,
	LinkEngineError,
} from "../core/errors.js";
import type {
	InputItem,
	LinkConfiguration,
	LinkEngine,
	OrderedInputPlan,
} from "../core/types/index.js";

export type InvokeError =
	| ConfigurationError
	| FileOpenError
	| InputResolutionError
	| LinkEngineError;

/**
 * Registers one plan item with the engine.
 *
 * @effect Effect<void, InputResolutionError>
 */
export function registerInput(
	engine: LinkEngine,
	item: InputItem,
): Effect.Effect<void, InputResolutionError> {
	return match(item)
		.with({ kind: "object" }, (object) =>
			engine.addObject(object.path).pipe(
				Effect.mapError(
					(failure: EngineFailure) =>
						new InputResolutionError({
							kind: "object",
							item: object.path,
							position: object.position,
							detail: failure.reason,
						}),
				),
			),
		)
		.with({ kind: "namespec" }, (spec) =>
			engine.addNameSpec(spec.name).pipe(
				Effect.mapError(
					(failure: EngineFailure) =>
						new InputResolutionError({
							kind: "namespec",
							item: spec.name,
							position: spec.position,
							detail: failure.reason,
						}),
				),
			),
		)
		.exhaustive();
}

/**
 * Configures the engine, sets the output, registers inputs in plan order, links.
 *
 * @param engine - Engine borrowed for this invocation
 * @param config - Immutable configuration
 * @param output - Resolved output path
 * @param plan - Inputs in command-line order
 *
 * @pure false (engine side effects)
 * @postcondition first failing step determines the error; no retries
 */
export function invokeLink(
	engine: LinkEngine,
	config: LinkConfiguration,
	output: string,
	plan: OrderedInputPlan,
): Effect.Effect<void, InvokeError> {
	return Effect.gen(function* () {
		yield* engine
			.configure(config)
			.pipe(
				Effect.mapError((f) => new ConfigurationError({ detail: f.reason })),
			);

		yield* engine
			.setOutput(output)
			.pipe(
				Effect.mapError(
					(f) => new FileOpenError({ path: output, detail: f.reason }),
				),
			);

		for (const item of plan) {
			yield* registerInput(engine, item);
		}

		yield* engine
			.link()
			.pipe(Effect.mapError((f) => new LinkEngineError({ detail: f.reason })));
	});
}
