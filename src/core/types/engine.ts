// CHANGE: Narrow collaborator interface for the external link engine
// PURITY: CORE (interface only)
// INVARIANT: The engine borrows configuration and inputs for one link attempt
// EFFECT: every operation is Effect<void, EngineFailure>

import type { Effect } from "effect";

import type { EngineFailure } from "../errors.js";
import type { LinkConfiguration } from "./link.js";

/**
 * External link engine.
 *
 * Operations are called in this order: configure, setOutput,
 * addObject/addNameSpec (any number, in plan order), link.
 */
export interface LinkEngine {
	readonly configure: (
		config: LinkConfiguration,
	) => Effect.Effect<void, EngineFailure>;
	readonly setOutput: (path: string) => Effect.Effect<void, EngineFailure>;
	readonly addObject: (path: string) => Effect.Effect<void, EngineFailure>;
	readonly addNameSpec: (name: string) => Effect.Effect<void, EngineFailure>;
	readonly link: () => Effect.Effect<void, EngineFailure>;
}

/**
 * Settings used to construct an engine for one invocation.
 */
export interface EngineSettings {
	readonly command: string;
}
