// CHANGE: Linker-style argument parser built on a handler table
// PURITY: CORE
// INVARIANT: ∀ positioned value v: v.position = index(v's argument) + 1 ≥ 1
// INVARIANT: positions are strictly increasing across objects and namespecs together
// INVARIANT: every value-bearing option carries a non-empty value

import { Either } from "effect";

import { UsageError } from "../errors.js";
import type {
	LinkOptions,
	ParsedCommand,
	PositionedValue,
} from "../types/index.js";

type Request = "link" | "help" | "version";

interface ParseState {
	readonly options: LinkOptions;
	readonly request: Request;
	readonly endOfOptions: boolean;
}

interface Step {
	readonly state: ParseState;
	readonly consumed: number;
}

type ValueSetter = (options: LinkOptions, value: string) => LinkOptions;
type FlagSetter = (options: LinkOptions, enabled: boolean) => LinkOptions;
type PrefixSetter = (
	options: LinkOptions,
	value: PositionedValue,
) => LinkOptions;

type OptionSpec =
	| { readonly kind: "value"; readonly set: ValueSetter }
	| { readonly kind: "flag"; readonly set: FlagSetter }
	| { readonly kind: "request"; readonly request: "help" | "version" };

const valueOption = (set: ValueSetter): OptionSpec => ({ kind: "value", set });
const flagOption = (set: FlagSetter): OptionSpec => ({ kind: "flag", set });
const requestOption = (request: "help" | "version"): OptionSpec => ({
	kind: "request",
	request,
});

const setTriple: ValueSetter = (o, v) => ({ ...o, targetTriple: v });
const setSymbolic: FlagSetter = (o, b) => ({ ...o, symbolic: b });

/**
 * Named options; matched after stripping one or two leading dashes.
 */
const OPTIONS: ReadonlyMap<string, OptionSpec> = new Map<string, OptionSpec>([
	["o", valueOption((o, v) => ({ ...o, output: v }))],
	["soname", valueOption((o, v) => ({ ...o, soname: v }))],
	["sysroot", valueOption((o, v) => ({ ...o, sysroot: v }))],
	["dynamic-linker", valueOption((o, v) => ({ ...o, dynamicLinker: v }))],
	[
		"wrap",
		valueOption((o, v) => ({ ...o, wrapSymbols: [...o.wrapSymbols, v] })),
	],
	[
		"portable",
		valueOption((o, v) => ({
			...o,
			portableSymbols: [...o.portableSymbols, v],
		})),
	],
	["mtriple", valueOption(setTriple)],
	["C", valueOption(setTriple)],
	["shared", flagOption((o, b) => ({ ...o, shared: b }))],
	["Bsymbolic", flagOption(setSymbolic)],
	["symbolic", flagOption(setSymbolic)],
	["help", requestOption("help")],
	["h", requestOption("help")],
	["version", requestOption("version")],
]);

/**
 * Single-dash options whose value may be glued to the flag (`-lfoo`, `-L/usr/lib`).
 */
const PREFIX_OPTIONS: ReadonlyMap<string, PrefixSetter> = new Map<
	string,
	PrefixSetter
>([
	["l", (o, v) => ({ ...o, nameSpecs: [...o.nameSpecs, v] })],
	["L", (o, v) => ({ ...o, searchDirs: [...o.searchDirs, v.value] })],
	["o", (o, v) => ({ ...o, output: v.value })],
]);

const INITIAL_STATE: ParseState = {
	options: {
		objectFiles: [],
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
	},
	request: "link",
	endOfOptions: false,
};

/**
 * Parses `true|false|1|0`.
 *
 * @pure true
 */
export function parseBooleanValue(text: string): boolean | undefined {
	if (text === "true" || text === "1") return true;
	if (text === "false" || text === "0") return false;
	return undefined;
}

function splitOption(token: string): {
	readonly name: string;
	readonly inline: string | undefined;
} {
	const body = token.startsWith("--") ? token.slice(2) : token.slice(1);
	const eq = body.indexOf("=");
	return eq === -1
		? { name: body, inline: undefined }
		: { name: body.slice(0, eq), inline: body.slice(eq + 1) };
}

function withOptions(state: ParseState, options: LinkOptions): ParseState {
	return { ...state, options };
}

function missingValue(flag: string): Either.Either<never, UsageError> {
	return Either.left(
		new UsageError({ detail: `option '${flag}' requires a value`, flag }),
	);
}

function applyOption(
	flag: string,
	spec: OptionSpec,
	inline: string | undefined,
	next: string | undefined,
	state: ParseState,
): Either.Either<Step, UsageError> {
	switch (spec.kind) {
		case "value": {
			const value = inline ?? next;
			if (value === undefined || value.length === 0) return missingValue(flag);
			return Either.right({
				state: withOptions(state, spec.set(state.options, value)),
				consumed: inline === undefined ? 2 : 1,
			});
		}
		case "flag": {
			const enabled = inline === undefined ? true : parseBooleanValue(inline);
			if (enabled === undefined) {
				return Either.left(
					new UsageError({
						detail: `invalid boolean value '${inline ?? ""}' for option '${flag}'`,
						flag,
					}),
				);
			}
			return Either.right({
				state: withOptions(state, spec.set(state.options, enabled)),
				consumed: 1,
			});
		}
		case "request": {
			if (inline !== undefined) {
				return Either.left(
					new UsageError({
						detail: `option '${flag}' does not take a value`,
						flag,
					}),
				);
			}
			// First request wins
			const request = state.request === "link" ? spec.request : state.request;
			return Either.right({ state: { ...state, request }, consumed: 1 });
		}
	}
}

function applyPrefix(
	flag: string,
	attached: string,
	next: string | undefined,
	position: number,
	set: PrefixSetter,
	state: ParseState,
): Either.Either<Step, UsageError> {
	if (attached.length > 0) {
		return Either.right({
			state: withOptions(state, set(state.options, { value: attached, position })),
			consumed: 1,
		});
	}
	if (next === undefined || next.length === 0) return missingValue(flag);
	return Either.right({
		state: withOptions(state, set(state.options, { value: next, position })),
		consumed: 2,
	});
}

function addObjectFile(
	state: ParseState,
	value: string,
	position: number,
): Step {
	const objectFiles = [...state.options.objectFiles, { value, position }];
	return {
		state: withOptions(state, { ...state.options, objectFiles }),
		consumed: 1,
	};
}

function step(
	args: ReadonlyArray<string>,
	index: number,
	state: ParseState,
): Either.Either<Step, UsageError> {
	const token = args[index] ?? "";
	const next = args[index + 1];
	const position = index + 1;

	if (token.length === 0) return Either.right({ state, consumed: 1 });

	const isOption = token.length > 1 && token.startsWith("-");
	if (state.endOfOptions || !isOption) {
		return Either.right(addObjectFile(state, token, position));
	}
	if (token === "--") {
		return Either.right({ state: { ...state, endOfOptions: true }, consumed: 1 });
	}

	const { name, inline } = splitOption(token);
	const spec = OPTIONS.get(name);
	if (spec !== undefined) {
		const flag =
			inline === undefined ? token : token.slice(0, token.length - inline.length - 1);
		return applyOption(flag, spec, inline, next, state);
	}

	const prefixFlag = token.slice(0, 2);
	const prefix = token.startsWith("--")
		? undefined
		: PREFIX_OPTIONS.get(prefixFlag.slice(1));
	if (prefix !== undefined) {
		return applyPrefix(prefixFlag, token.slice(2), next, position, prefix, state);
	}

	return Either.left(
		new UsageError({ detail: `unknown option '${token}'`, flag: token }),
	);
}

function finish(state: ParseState): Either.Either<ParsedCommand, UsageError> {
	const { options, request } = state;
	if (request === "help") return Either.right<ParsedCommand>({ kind: "help" });
	if (request === "version") {
		return Either.right<ParsedCommand>(
			options.targetTriple === undefined
				? { kind: "version" }
				: { kind: "version", targetTriple: options.targetTriple },
		);
	}
	if (options.objectFiles.length === 0) {
		return Either.left(new UsageError({ detail: "no input files" }));
	}
	return Either.right<ParsedCommand>({ kind: "link", options });
}

/**
 * Parses the argument vector (program name excluded).
 *
 * @returns The requested command, or the first UsageError encountered
 *
 * @pure true
 * @invariant link ⇒ options.objectFiles.length ≥ 1
 *
 * @example
 * ```ts
 * parseArguments(["a.o", "-lm", "-o", "prog"]);
 * // right({ kind: "link", options: { objectFiles: [{ value: "a.o", position: 1 }],
 * //   nameSpecs: [{ value: "m", position: 2 }], output: "prog", ... } })
 * ```
 */
export function parseArguments(
	args: ReadonlyArray<string>,
): Either.Either<ParsedCommand, UsageError> {
	let state = INITIAL_STATE;
	let index = 0;
	while (index < args.length) {
		const result = step(args, index, state);
		if (Either.isLeft(result)) return Either.left(result.left);
		state = result.right.state;
		index += result.right.consumed;
	}
	return finish(state);
}
