// CHANGE: Load linkplan.config.json with hand-written JSON type guards
// PURITY: SHELL (filesystem read)
// EFFECT: Effect<DriverConfig, DriverConfigError>
// INVARIANT: missing file → {} ; invalid file → DriverConfigError (never silently defaulted)

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { DriverConfigError } from "../../core/errors.js";
import type { DriverConfig } from "../../core/types/index.js";

export const DRIVER_CONFIG_FILE = "linkplan.config.json";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

const CONFIG_KEYS = ["linker", "targetTriple"] as const;

/**
 * Validates the parsed JSON document.
 *
 * @returns DriverConfig or the reason the document was rejected
 * @pure true
 */
export function validateDriverConfig(value: JSONValue): DriverConfig | string {
	if (!isJSONObject(value)) return "expected a JSON object";
	let config: DriverConfig = {};
	for (const key of CONFIG_KEYS) {
		const field = value[key];
		if (field === undefined) continue;
		if (typeof field !== "string" || field.length === 0) {
			return `'${key}' must be a non-empty string`;
		}
		config = { ...config, [key]: field };
	}
	return config;
}

const errorDetail = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Loads the driver configuration from `cwd`.
 *
 * @param cwd - Directory holding linkplan.config.json
 *
 * @pure false (reads the filesystem)
 * @effect Effect<DriverConfig, DriverConfigError>
 */
export function loadDriverConfig(
	cwd: string,
): Effect.Effect<DriverConfig, DriverConfigError> {
	const configPath = path.join(cwd, DRIVER_CONFIG_FILE);
	return Effect.gen(function* () {
		if (!fs.existsSync(configPath)) return {};
		const parsed = yield* Effect.try({
			try: (): JSONValue => JSON.parse(fs.readFileSync(configPath, "utf8")),
			catch: (error) =>
				new DriverConfigError({ path: configPath, detail: errorDetail(error) }),
		});
		const validated = validateDriverConfig(parsed);
		if (typeof validated === "string") {
			return yield* Effect.fail(
				new DriverConfigError({ path: configPath, detail: validated }),
			);
		}
		return validated;
	});
}
