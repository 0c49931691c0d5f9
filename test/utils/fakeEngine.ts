// CHANGE: In-process LinkEngine stand-in that records every call
// INVARIANT: calls are recorded in invocation order, including the failing one

import { Effect } from "effect";

import { EngineFailure } from "../../src/core/errors.js";
import type {
	LinkConfiguration,
	LinkEngine,
} from "../../src/core/types/index.js";

export type EngineMethod =
	| "configure"
	| "setOutput"
	| "addObject"
	| "addNameSpec"
	| "link";

export interface EngineCall {
	readonly method: EngineMethod;
	readonly argument: string;
}

/**
 * Makes `method` fail; with `argument`, only for that argument.
 */
export interface ScriptedFailure {
	readonly method: EngineMethod;
	readonly argument?: string;
	readonly reason: string;
}

export interface FakeEngine {
	readonly engine: LinkEngine;
	readonly calls: EngineCall[];
	readonly configurations: LinkConfiguration[];
}

export function createFakeEngine(
	failures: ReadonlyArray<ScriptedFailure> = [],
): FakeEngine {
	const calls: EngineCall[] = [];
	const configurations: LinkConfiguration[] = [];

	const record = (
		method: EngineMethod,
		argument: string,
	): Effect.Effect<void, EngineFailure> =>
		Effect.suspend((): Effect.Effect<void, EngineFailure> => {
			calls.push({ method, argument });
			const failure = failures.find(
				(f) =>
					f.method === method &&
					(f.argument === undefined || f.argument === argument),
			);
			return failure === undefined
				? Effect.void
				: Effect.fail(new EngineFailure({ reason: failure.reason }));
		});

	const engine: LinkEngine = {
		configure: (config) =>
			Effect.sync(() => configurations.push(config)).pipe(
				Effect.zipRight(record("configure", "")),
			),
		setOutput: (path) => record("setOutput", path),
		addObject: (path) => record("addObject", path),
		addNameSpec: (name) => record("addNameSpec", name),
		link: () => record("link", ""),
	};

	return { engine, calls, configurations };
}

export const methodsOf = (calls: ReadonlyArray<EngineCall>): EngineMethod[] =>
	calls.map((c) => c.method);
