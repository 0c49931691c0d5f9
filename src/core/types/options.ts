// CHANGE: Validated option model produced by the argument parser
// PURITY: CORE
// INVARIANT: position ≥ 1 for every positioned value; 0 is never a real position

/**
 * Argument value tagged with its command-line position.
 *
 * @property value The argument text (path or library name)
 * @property position 1-based index of the argument that introduced the value
 */
export interface PositionedValue {
	readonly value: string;
	readonly position: number;
}

/**
 * Every option the driver understands, in explicit form.
 *
 * Empty strings stand for "not given" on string-valued fields.
 */
export interface LinkOptions {
	readonly objectFiles: ReadonlyArray<PositionedValue>;
	readonly nameSpecs: ReadonlyArray<PositionedValue>;
	readonly output: string;
	readonly soname: string;
	readonly sysroot: string;
	readonly dynamicLinker: string;
	readonly wrapSymbols: ReadonlyArray<string>;
	readonly portableSymbols: ReadonlyArray<string>;
	readonly searchDirs: ReadonlyArray<string>;
	readonly shared: boolean;
	readonly symbolic: boolean;
	readonly targetTriple?: string;
}

/**
 * What the invocation asks for.
 */
export type ParsedCommand =
	| { readonly kind: "link"; readonly options: LinkOptions }
	| { readonly kind: "help" }
	| { readonly kind: "version"; readonly targetTriple?: string };
