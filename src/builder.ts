import { RoadPath } from "./path.js";

/**
 * Mutable accumulator of path segments.
 *
 * @remarks
 *
 * {@link PathBuilder.parent} appends a literal `..` instead of dropping the previous segment, and
 * {@link PathBuilder.build} neither normalizes nor resets, so later `add` calls extend what the next
 * `build` returns. Call {@link RoadPath.normalize} on the result to fold the `..` segments away.
 *
 * @example
 * ```ts
 * import { builder } from "roadpath";
 *
 * const built = builder("/tmp").add("app").parent().add("data").build();
 * built.toString(); // '/tmp/app/../data'
 * built.normalize().toString(); // '/tmp/data'
 * ```
 */
export class PathBuilder {
	private readonly parts: string[];

	constructor(base = "") {
		this.parts = base ? [base] : [];
	}

	get segments(): readonly string[] {
		return [...this.parts];
	}

	add(...segments: string[]): this {
		this.parts.push(...segments);
		return this;
	}

	parent(): this {
		this.parts.push("..");
		return this;
	}

	build(): RoadPath {
		return new RoadPath(...this.parts);
	}

	toString(): string {
		return this.build().toString();
	}
}

export function builder(base = ""): PathBuilder {
	return new PathBuilder(base);
}
