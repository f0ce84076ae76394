/**
 * Reasons a lexical path operation can fail.
 *
 * @remarks
 *
 * Filesystem failures are not listed here: they surface as Node's own `ErrnoException`s, unwrapped.
 */
export type PathErrorCode =
	| "not-relative"
	| "different-anchors"
	| "empty-name"
	| "invalid-name"
	| "invalid-suffix"
	| "relative-uri"
	| "empty-sequence"
	| "mixed-anchors"
	| "no-common-path"
	| "invalid-pattern";

/**
 * Error raised by path algebra that cannot produce a result.
 *
 * @example Detecting a path outside its base
 * ```ts
 * import { PathError, RoadPath } from "roadpath";
 *
 * try {
 *   new RoadPath("/srv/app").relativeTo("/home");
 * } catch (error) {
 *   if (error instanceof PathError && error.code === "not-relative") {
 *     console.log(error.message); // '/srv/app is not in the subpath of /home'
 *   }
 * }
 * ```
 */
export class PathError extends Error {
	readonly code: PathErrorCode;
	readonly path?: string;
	readonly other?: string;

	constructor(
		code: PathErrorCode,
		message: string,
		fields?: { path?: string; other?: string },
	) {
		super(message);
		this.name = "PathError";
		this.code = code;
		if (fields?.path !== undefined) this.path = fields.path;
		if (fields?.other !== undefined) this.other = fields.other;
	}
}
