// CHANGE: Centralize test data builders shared across core and app tests

import { Either } from "effect";

import type { UsageError } from "../../src/core/errors.js";
import { parseArguments } from "../../src/core/options/parse.js";
import type {
	InputItem,
	LinkOptions,
	PositionedValue,
} from "../../src/core/types/index.js";

/** Build LinkOptions with parser defaults. */
export const linkOptions = (over: Partial<LinkOptions> = {}): LinkOptions => ({
	objectFiles: [{ value: "main.o", position: 1 }],
	nameSpecs: [],
	output: "",
	soname: "",
	sysroot: "",
	dynamicLinker: "",
	wrapSymbols: [],
	portableSymbols: [],
	searchDirs: [],
	shared: false,
	symbolic: true,
	...over,
});

export const positioned = (value: string, position: number): PositionedValue => ({
	value,
	position,
});

export const objectItem = (path: string, position: number): InputItem => ({
	kind: "object",
	path,
	position,
});

export const nameItem = (name: string, position: number): InputItem => ({
	kind: "namespec",
	name,
	position,
});

/** Parse arguments that must produce a link command. */
export function parseLink(args: ReadonlyArray<string>): LinkOptions {
	const result = parseArguments(args);
	if (Either.isLeft(result) || result.right.kind !== "link") {
		throw new Error(`expected a link command for [${args.join(" ")}]`);
	}
	return result.right.options;
}

/** Parse arguments that must be rejected. */
export function parseFailure(args: ReadonlyArray<string>): UsageError {
	const result = parseArguments(args);
	if (Either.isRight(result)) {
		throw new Error(`expected a usage error for [${args.join(" ")}]`);
	}
	return result.left;
}
