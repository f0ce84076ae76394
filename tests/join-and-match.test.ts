import { describe, expect, test } from "vitest";
import { PurePosixRoadPath } from "../src/index.js";

const P = PurePosixRoadPath;

describe("match", () => {
	test("relative patterns match trailing components", () => {
		const p = new P("a/b/c.txt");
		expect(p.match("*.txt")).toBe(true);
		expect(p.match("b/*.txt")).toBe(true);
		expect(p.match("a/*.txt")).toBe(false);
		expect(p.match("x/a/b/c.txt")).toBe(false);
	});

	test("anchored patterns must cover the whole path", () => {
		const p = new P("/a/b/c.py");
		expect(p.match("/a/*/*.py")).toBe(true);
		expect(p.match("/*.py")).toBe(false);
		expect(new P("a/b.py").match("/a/*.py")).toBe(false);
	});

	test("wildcards within a component", () => {
		const p = new P("logs/file1.log");
		expect(p.match("file?.log")).toBe(true);
		expect(p.match("file[0-9].log")).toBe(true);
		expect(p.match("file[!0-9].log")).toBe(false);
		expect(new P(".env").match("*")).toBe(true);
	});

	test("POSIX matching is case-sensitive unless overridden", () => {
		const p = new P("a/B.TXT");
		expect(p.match("*.txt")).toBe(false);
		expect(p.match("*.txt", { caseSensitive: false })).toBe(true);
	});

	test("braces and extglob groups are matched literally", () => {
		expect(new P("x/{a,b}.txt").match("{a,b}.txt")).toBe(true);
		expect(new P("x/a.txt").match("{a,b}.txt")).toBe(false);
		expect(new P("x/+(y)").match("+(y)")).toBe(true);
		expect(new P("x/yy").match("+(y)")).toBe(false);
		expect(new P("x/a.txt").match("@(a).txt")).toBe(false);
		expect(new P("x/{a,b}.txt").fullMatch("x/{a,b}.txt")).toBe(true);
		expect(new P("x/b.txt").fullMatch("x/{a,b}.txt")).toBe(false);
	});

	test("empty or '.' pattern does not match", () => {
		const p = new P("a");
		expect(p.match("")).toBe(false);
		expect(p.match(".")).toBe(false);
	});
});

describe("fullMatch", () => {
	test("requires the whole path, with '**' spanning components", () => {
		const p = new P("/a/b/c.py");
		expect(p.fullMatch("/a/*/*.py")).toBe(true);
		expect(p.fullMatch("/a/*.py")).toBe(false);
		expect(p.fullMatch("/a/**")).toBe(true);
		expect(new P("a/b/c.py").fullMatch("**/*.py")).toBe(true);
	});
});
