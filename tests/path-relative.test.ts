import nodepath from "node:path";
import { describe, expect, test } from "vitest";
import {
	PathError,
	PurePosixRoadPath,
	RoadPath,
	relative,
} from "../src/index.js";
import { captureError, isPosixHost } from "./helpers.js";

const P = PurePosixRoadPath;

describe("relativeTo", () => {
	test("descendant of the base", () => {
		const p = new P("/a/b/c");
		expect(p.relativeTo("/a").toString()).toBe("b/c");
		expect(p.relativeTo(new P("/a")).equals(new P("b/c"))).toBe(true);
		expect(p.relativeTo("/a/b/c").toString()).toBe(".");
	});

	test("unrelated base is a descendant violation", () => {
		const error = captureError(() => new P("/a/b/c").relativeTo("/z"));
		expect(error).toBeInstanceOf(PathError);
		expect(error).toMatchObject({
			code: "not-relative",
			message: "/a/b/c is not in the subpath of /z",
			path: "/a/b/c",
			other: "/z",
		});
	});

	test("a deeper base is not an ancestor", () => {
		expect(() => new P("/a/b").relativeTo("/a/b/c")).toThrowError(
			"/a/b is not in the subpath of /a/b/c",
		);
	});

	test("absolute against relative has different anchors", () => {
		expect(captureError(() => new P("/a/b/c").relativeTo("x/y"))).toMatchObject(
			{ code: "different-anchors" },
		);
		expect(captureError(() => new P("a/b/c").relativeTo("/x/y"))).toMatchObject(
			{ code: "different-anchors" },
		);
	});

	test("comparison is lexical: '..' in the base is not folded", () => {
		expect(captureError(() => new P("/a/b").relativeTo("/a/x/.."))).toMatchObject(
			{ code: "not-relative" },
		);
		expect(new P("/a/b").relativeTo(new P("/a/x/..").normalize()).toString()).toBe(
			"b",
		);
	});

	test("isRelativeTo", () => {
		const p = new P("/a/b/c");
		expect(p.isRelativeTo("/a/b")).toBe(true);
		expect(p.isRelativeTo("/x")).toBe(false);
		expect(p.isRelativeTo("a")).toBe(false);
	});
});

describe("relativeTo with walkUp", () => {
	test("climbs out of the base", () => {
		expect(new P("/a").relativeTo("/a/b/c", { walkUp: true }).toString()).toBe(
			"../..",
		);
		expect(
			new P("/a/b/c").relativeTo("/x/y/z", { walkUp: true }).toString(),
		).toBe("../../../a/b/c");
		expect(new P("a/b/c").relativeTo("x/y/z", { walkUp: true }).toString()).toBe(
			"../../../a/b/c",
		);
	});

	test("cannot climb through a '..' in the base", () => {
		expect(
			captureError(() =>
				new P("/a/b").relativeTo("/a/../c", { walkUp: true }),
			),
		).toMatchObject({ code: "not-relative" });
	});

	test("still needs matching anchors", () => {
		expect(
			captureError(() => new P("/a/b/c").relativeTo("x/y/z", { walkUp: true })),
		).toMatchObject({ code: "different-anchors" });
	});
});

describe.runIf(isPosixHost)("relative()", () => {
	test("against an explicit base", () => {
		expect(relative("/a/b/c", "/a")).toBe("b/c");
		expect(() => relative("/a/b/c", "/z")).toThrow(PathError);
	});

	test("defaults the base to the working directory", () => {
		const inside = nodepath.join(process.cwd(), "src", "index.ts");
		expect(relative(inside)).toBe("src/index.ts");
		expect(relative(inside, "")).toBe("src/index.ts");
	});

	test("RoadPath.relativeTo returns a RoadPath", () => {
		const out = new RoadPath("/srv/app/logs").relativeTo("/srv");
		expect(out).toBeInstanceOf(RoadPath);
		expect(out.toString()).toBe("app/logs");
	});
});
