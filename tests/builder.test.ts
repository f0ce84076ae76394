import { describe, expect, test } from "vitest";
import { builder, PathBuilder, RoadPath } from "../src/index.js";
import { isPosixHost } from "./helpers.js";

describe.runIf(isPosixHost)("PathBuilder", () => {
	test("parent() appends a literal '..' that build() keeps", () => {
		const built = builder("/tmp").add("app").parent().add("data").build();
		expect(built).toBeInstanceOf(RoadPath);
		expect(built.toString()).toBe("/tmp/app/../data");
		expect(built.equals(new RoadPath("/tmp/data"))).toBe(false);
	});

	test("normalizing the built path folds the '..' away", () => {
		const built = builder("/tmp").add("app").parent().add("data").build();
		expect(built.normalize().toString()).toBe("/tmp/data");
		expect(built.normalize().equals(new RoadPath("/tmp/data"))).toBe(true);
	});

	test("add takes several segments and chains", () => {
		const b = new PathBuilder();
		expect(b.add("a", "b")).toBe(b);
		expect(b.parent()).toBe(b);
		expect(b.segments).toEqual(["a", "b", ".."]);
		expect(b.toString()).toBe("a/b/..");
	});

	test("an empty builder builds the current directory", () => {
		expect(builder().build().toString()).toBe(".");
		expect(builder("").segments).toEqual([]);
	});

	test("an absolute segment replaces the accumulated path", () => {
		expect(builder("/srv").add("/etc", "hosts").build().toString()).toBe(
			"/etc/hosts",
		);
	});

	test("build does not reset, so later segments accumulate", () => {
		const b = builder("/srv");
		const first = b.add("a").build();
		const second = b.add("b").build();
		expect(first.toString()).toBe("/srv/a");
		expect(second.toString()).toBe("/srv/a/b");
		expect(b.build().toString()).toBe("/srv/a/b");
		expect(b.segments).toEqual(["/srv", "a", "b"]);
	});
});
