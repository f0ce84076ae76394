/**
 * Path values, path algebra and filesystem predicates for Node.js.
 *
 * @remarks
 *
 * The entry points are:
 *
 * - {@link PureRoadPath} for lexical work that never touches the disk, with {@link PurePosixRoadPath} and
 *   {@link PureWindowsRoadPath} for a fixed flavour.
 * - {@link RoadPath} for the same operations plus `absolute`, `resolve`, `glob` and the `exists`/`isFile`/
 *   `isDir`/`isSymlink` predicates, each as a blocking `Sync` method and a promise-returning twin.
 * - Free functions (`join`, `dirname`, `splitext`, `commonpath`, ...) over plain strings.
 * - {@link PathBuilder} for assembling a path segment by segment.
 *
 * Lexical failures throw {@link PathError}; filesystem failures are Node's own errors.
 */

import { builder, PathBuilder } from "./builder.js";
import { PathError } from "./errors.js";
import {
	absolute,
	basename,
	commonpath,
	commonprefix,
	dirname,
	expand,
	expanduser,
	expandvars,
	join,
	normalize,
	relative,
	resolve,
	samefile,
	split,
	splitext,
} from "./functions.js";
import { RoadPath } from "./path.js";
import {
	PathParents,
	PurePosixRoadPath,
	PureRoadPath,
	PureWindowsRoadPath,
} from "./purepath.js";

export { builder, PathBuilder } from "./builder.js";
export type { PathErrorCode } from "./errors.js";
export { PathError } from "./errors.js";
export {
	absolute,
	basename,
	commonpath,
	commonprefix,
	dirname,
	expand,
	expanduser,
	expandvars,
	join,
	normalize,
	relative,
	resolve,
	samefile,
	split,
	splitext,
} from "./functions.js";
export { RoadPath } from "./path.js";
export type { PathLike, PathParts } from "./purepath.js";
export {
	PathParents,
	PurePosixRoadPath,
	PureRoadPath,
	PureWindowsRoadPath,
} from "./purepath.js";
export { toPromise } from "./util.js";

export default {
	PathError,
	PureRoadPath,
	PurePosixRoadPath,
	PureWindowsRoadPath,
	RoadPath,
	PathParents,
	PathBuilder,
	builder,
	join,
	split,
	dirname,
	basename,
	splitext,
	normalize,
	absolute,
	resolve,
	relative,
	expanduser,
	expandvars,
	expand,
	commonpath,
	commonprefix,
	samefile,
};
