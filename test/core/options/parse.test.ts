// CHANGE: Unit tests for linker-style argument parsing
// INVARIANT: positions are 1-based argument indexes shared by objects and namespecs

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	parseArguments,
	parseBooleanValue,
} from "../../../src/core/options/parse.js";
import { parseFailure, parseLink } from "../../utils/builders.js";

describe("parseArguments: defaults and positional", () => {
	it("returns defaults for a single input", (): void => {
		const opts = parseLink(["main.o"]);
		expect(opts.objectFiles).toEqual([{ value: "main.o", position: 1 }]);
		expect(opts.nameSpecs).toEqual([]);
		expect(opts.output).toBe("");
		expect(opts.soname).toBe("");
		expect(opts.shared).toBe(false);
		expect(opts.symbolic).toBe(true);
		expect(opts.searchDirs).toEqual([]);
		expect(opts.targetTriple).toBeUndefined();
	});

	it("shares one position counter between objects and namespecs", (): void => {
		const opts = parseLink(["a.o", "-lm", "b.o", "-l", "c"]);
		expect(opts.objectFiles).toEqual([
			{ value: "a.o", position: 1 },
			{ value: "b.o", position: 3 },
		]);
		expect(opts.nameSpecs).toEqual([
			{ value: "m", position: 2 },
			{ value: "c", position: 4 },
		]);
	});

	it("ignores empty string arguments but keeps their index", (): void => {
		const opts = parseLink(["", "x.o"]);
		expect(opts.objectFiles).toEqual([{ value: "x.o", position: 2 }]);
	});

	it("treats a lone dash as an input", (): void => {
		expect(parseLink(["-"]).objectFiles).toEqual([{ value: "-", position: 1 }]);
	});

	it("treats everything after -- as inputs", (): void => {
		const opts = parseLink(["--", "-weird.o", "x.o"]);
		expect(opts.objectFiles).toEqual([
			{ value: "-weird.o", position: 2 },
			{ value: "x.o", position: 3 },
		]);
	});
});

describe("parseArguments: value options", () => {
	it("accepts -o in separate, glued and = forms", (): void => {
		expect(parseLink(["-o", "prog", "a.o"]).output).toBe("prog");
		expect(parseLink(["-oprog", "a.o"]).output).toBe("prog");
		expect(parseLink(["-o=prog", "a.o"]).output).toBe("prog");
	});

	it("does not treat the -o value as an input", (): void => {
		expect(parseLink(["-o", "prog", "a.o"]).objectFiles).toEqual([
			{ value: "a.o", position: 3 },
		]);
	});

	it("collects -L directories in order, keeping =sysroot prefixes", (): void => {
		const opts = parseLink(["-L/a", "-L", "/b", "-L=/c", "x.o"]);
		expect(opts.searchDirs).toEqual(["/a", "/b", "=/c"]);
	});

	it("accepts long options with one or two dashes", (): void => {
		const opts = parseLink([
			"--soname",
			"libx.so.1",
			"--sysroot=/sdk",
			"-dynamic-linker",
			"/lib/ld.so",
			"--wrap",
			"malloc",
			"--wrap=free",
			"--portable",
			"memcpy",
			"x.o",
		]);
		expect(opts.soname).toBe("libx.so.1");
		expect(opts.sysroot).toBe("/sdk");
		expect(opts.dynamicLinker).toBe("/lib/ld.so");
		expect(opts.wrapSymbols).toEqual(["malloc", "free"]);
		expect(opts.portableSymbols).toEqual(["memcpy"]);
		expect(opts.objectFiles).toEqual([{ value: "x.o", position: 11 }]);
	});

	it("reads the target triple from -mtriple or -C", (): void => {
		expect(parseLink(["-mtriple", "aarch64-linux-gnu", "x.o"]).targetTriple).toBe(
			"aarch64-linux-gnu",
		);
		expect(parseLink(["-C=arm-none-eabi", "x.o"]).targetTriple).toBe(
			"arm-none-eabi",
		);
	});
});

describe("parseArguments: boolean flags", () => {
	it("--shared selects shared output", (): void => {
		expect(parseLink(["--shared", "x.o"]).shared).toBe(true);
	});

	it("--Bsymbolic=false and -symbolic=0 turn symbolic binding off", (): void => {
		expect(parseLink(["--Bsymbolic=false", "x.o"]).symbolic).toBe(false);
		expect(parseLink(["-symbolic=0", "x.o"]).symbolic).toBe(false);
	});

	it("rejects values that are not booleans", (): void => {
		const error = parseFailure(["--shared=maybe", "x.o"]);
		expect(error.detail).toBe(
			"invalid boolean value 'maybe' for option '--shared'",
		);
		expect(error.flag).toBe("--shared");
	});

	it("parseBooleanValue maps true/false/1/0", (): void => {
		expect(parseBooleanValue("true")).toBe(true);
		expect(parseBooleanValue("1")).toBe(true);
		expect(parseBooleanValue("false")).toBe(false);
		expect(parseBooleanValue("0")).toBe(false);
		expect(parseBooleanValue("yes")).toBeUndefined();
	});
});

describe("parseArguments: usage errors", () => {
	it("requires at least one input", (): void => {
		const error = parseFailure([]);
		expect(error._tag).toBe("UsageError");
		expect(error.detail).toBe("no input files");
	});

	it("rejects unknown flags", (): void => {
		const error = parseFailure(["--bogus", "x.o"]);
		expect(error.detail).toBe("unknown option '--bogus'");
		expect(error.flag).toBe("--bogus");
		expect(parseFailure(["--lfoo", "x.o"]).detail).toBe(
			"unknown option '--lfoo'",
		);
	});

	it("rejects value-bearing flags without a value", (): void => {
		expect(parseFailure(["x.o", "-o"]).detail).toBe(
			"option '-o' requires a value",
		);
		expect(parseFailure(["x.o", "-l"]).detail).toBe(
			"option '-l' requires a value",
		);
		expect(parseFailure(["x.o", "-L", ""]).detail).toBe(
			"option '-L' requires a value",
		);
		expect(parseFailure(["x.o", "--soname"]).detail).toBe(
			"option '--soname' requires a value",
		);
	});

	it("rejects empty values for value-bearing options", (): void => {
		expect(parseFailure(["-mtriple=", "a.o"]).detail).toBe(
			"option '-mtriple' requires a value",
		);
		expect(parseFailure(["-C", "", "a.o"]).detail).toBe(
			"option '-C' requires a value",
		);
		expect(parseFailure(["-o", "", "a.o"]).detail).toBe(
			"option '-o' requires a value",
		);
		expect(parseFailure(["--wrap=", "a.o"]).flag).toBe("--wrap");
	});

	it("rejects a value on --help", (): void => {
		expect(parseFailure(["--help=yes"]).detail).toBe(
			"option '--help' does not take a value",
		);
	});
});

describe("parseArguments: help and version", () => {
	it("--help needs no inputs", (): void => {
		expect(parseArguments(["--help"])).toEqual(Either.right({ kind: "help" }));
		expect(parseArguments(["-h", "x.o"])).toEqual(Either.right({ kind: "help" }));
	});

	it("--version carries an explicit triple", (): void => {
		expect(parseArguments(["--version", "-mtriple", "t"])).toEqual(
			Either.right({ kind: "version", targetTriple: "t" }),
		);
		expect(parseArguments(["--version"])).toEqual(
			Either.right({ kind: "version" }),
		);
	});

	it("the first request wins", (): void => {
		expect(parseArguments(["--version", "--help"])).toEqual(
			Either.right({ kind: "version" }),
		);
	});
});
