/**
 * String-in, string-out counterparts of the {@link RoadPath} operations.
 *
 * @remarks
 *
 * Every function parses with the host's flavour and returns the string form of the result, so
 * `join("a", "b")` and `new RoadPath("a", "b").toString()` always agree.
 */

import fs from "node:fs";
import nodeos from "node:os";
import { PathError } from "./errors.js";
import { RoadPath } from "./path.js";
import { isWindows } from "./purepath.js";

const VARIABLE_PATTERN = /\$(\w+|\{[^}]*\})/g;

function foldCase(value: string): string {
	return isWindows ? value.toLowerCase() : value;
}

function stripTrailingSeparator(value: string): string {
	const parser = RoadPath.parser;
	const { root } = parser.parse(value);
	if (value === root || !value.endsWith(parser.sep)) return value;
	return value.slice(0, -parser.sep.length);
}

function currentUsername(): string | undefined {
	try {
		return nodeos.userInfo().username;
	} catch {
		// No passwd entry for the running uid.
		return undefined;
	}
}

/**
 * Join segments with the host's rules; a rooted segment restarts the path.
 *
 * @example
 * ```ts
 * join("a", "b", "c"); // 'a/b/c'
 * join("/a", "/b"); // '/b'
 * ```
 */
export function join(...parts: string[]): string {
	return new RoadPath(...parts).toString();
}

/**
 * Split a path into its parent and final component.
 *
 * @example
 * ```ts
 * split("/a/b/c.txt"); // ['/a/b', 'c.txt']
 * ```
 */
export function split(path: string): [string, string] {
	const value = new RoadPath(path);
	return [value.parent.toString(), value.name];
}

/**
 * The lexical parent, or the path itself for an anchor or `.`.
 */
export function dirname(path: string): string {
	return new RoadPath(path).parent.toString();
}

/**
 * The final component, or `""` for an anchor.
 */
export function basename(path: string): string {
	return new RoadPath(path).name;
}

/**
 * Split off the last suffix.
 *
 * @example
 * ```ts
 * splitext("/a/b/c.tar.gz"); // ['/a/b/c.tar', '.gz']
 * ```
 *
 * @throws {@link PathError} `empty-name` when the path is only an anchor or `.`.
 */
export function splitext(path: string): [string, string] {
	const value = new RoadPath(path);
	return [value.withSuffix("").toString(), value.suffix];
}

/**
 * Collapse `.`, `..` and repeated separators lexically.
 *
 * @remarks
 *
 * Unlike `node:path`'s `normalize`, a trailing separator is dropped: `normalize("a/b/")` is `a/b`.
 */
export function normalize(path: string): string {
	return stripTrailingSeparator(RoadPath.parser.normalize(path));
}

/**
 * Anchor a relative path at the working directory without collapsing `..`.
 *
 * @param path - Path to make absolute.
 * @returns The absolute path string.
 */
export function absolute(path: string): string {
	return new RoadPath(path).absolute().toString();
}

/**
 * Canonical absolute form: symlinks followed before `..` is applied, missing components kept as
 * written.
 *
 * @param path - Path to resolve.
 * @returns The canonical path string.
 * @throws Node's `ErrnoException` for failures other than a missing entry.
 */
export function resolve(path: string): string {
	return new RoadPath(path).resolveSync().toString();
}

/**
 * `path` relative to `base`, or to the current working directory when `base` is omitted or empty.
 *
 * @param path - Path to express relatively.
 * @param base - Ancestor to measure from.
 *
 * @throws {@link PathError} When `path` does not lie below `base`.
 */
export function relative(path: string, base?: string): string {
	return new RoadPath(path).relativeTo(base || process.cwd()).toString();
}

/**
 * Replace a leading `~` or `~user` with the home directory.
 *
 * @remarks
 *
 * Only the current user's home is known, so `~someone-else` is returned unchanged, as is a path when
 * no home directory can be determined.
 */
export function expanduser(path: string): string {
	if (!path.startsWith("~")) return path;
	const parser = RoadPath.parser;
	let end = path.indexOf(parser.sep, 1);
	if (isWindows) {
		const alt = path.indexOf("/", 1);
		if (alt !== -1 && (end === -1 || alt < end)) end = alt;
	}
	if (end === -1) end = path.length;
	const user = path.slice(1, end);
	if (user && user !== currentUsername()) return path;
	const home = nodeos.homedir();
	if (!home) return path;
	const trimmed = home.replace(isWindows ? /[\\/]+$/ : /\/+$/, "");
	return trimmed + path.slice(end) || parser.sep;
}

/**
 * Substitute `$name` and `${name}` with environment variables.
 *
 * @remarks
 *
 * Names are word characters. Variables that are not set stay in the output as written.
 *
 * @example
 * ```ts
 * // with PROJECT=demo
 * expandvars("/srv/${PROJECT}/$UNSET"); // '/srv/demo/$UNSET'
 * ```
 */
export function expandvars(path: string): string {
	if (!path.includes("$")) return path;
	return path.replace(VARIABLE_PATTERN, (token, raw: string) => {
		const name = raw.startsWith("{") ? raw.slice(1, -1) : raw;
		return process.env[name] ?? token;
	});
}

/**
 * {@link expanduser} followed by {@link expandvars}.
 */
export function expand(path: string): string {
	return expandvars(expanduser(path));
}

/**
 * Longest common ancestor of the given paths, compared component by component.
 *
 * @throws {@link PathError} `empty-sequence` for no paths; `mixed-anchors` when absolute and relative
 * paths are mixed or drives differ; `no-common-path` when no component is shared and none of the
 * paths is the bare anchor.
 *
 * @example
 * ```ts
 * commonpath(["/a/b/c", "/a/b/d"]); // '/a/b'
 * commonpath(["/ab/c", "/abd/e"]); // throws PathError (no-common-path)
 * ```
 */
export function commonpath(paths: readonly string[]): string {
	const [first, ...rest] = paths.map((path) => new RoadPath(path));
	if (!first) {
		throw new PathError(
			"empty-sequence",
			"commonpath() arg is an empty sequence",
		);
	}
	for (const other of rest) {
		if (other.isAbsolute() !== first.isAbsolute()) {
			throw new PathError(
				"mixed-anchors",
				"Can't mix absolute and relative paths",
				{ path: first.toString(), other: other.toString() },
			);
		}
		if (foldCase(other.anchor) !== foldCase(first.anchor)) {
			throw new PathError("mixed-anchors", "Paths don't have the same drive", {
				path: first.toString(),
				other: other.toString(),
			});
		}
	}

	const tails = [first, ...rest].map((path) =>
		path.parts.slice(path.anchor ? 1 : 0),
	);
	const common: string[] = [];
	const [head = [], ...others] = tails;
	for (const [index, component] of head.entries()) {
		const shared = others.every((tail) => {
			const candidate = tail[index];
			return (
				candidate !== undefined && foldCase(candidate) === foldCase(component)
			);
		});
		if (!shared) break;
		common.push(component);
	}

	if (common.length === 0 && tails.every((tail) => tail.length > 0)) {
		throw new PathError(
			"no-common-path",
			`${paths.join(", ")} have no common path`,
			{ path: first.toString() },
		);
	}
	return new RoadPath(first.anchor || ".", ...common).toString();
}

/**
 * Longest common leading substring, with no regard for component boundaries.
 *
 * @example
 * ```ts
 * commonprefix(["/ab/c", "/abd/e"]); // '/ab'
 * ```
 */
export function commonprefix(paths: readonly string[]): string {
	const [first, ...rest] = paths;
	if (first === undefined) return "";
	let length = first.length;
	for (const other of rest) {
		let index = 0;
		while (index < length && first[index] === other[index]) index += 1;
		length = index;
	}
	return first.slice(0, length);
}

/**
 * Whether two paths name the same filesystem entry (same device and inode).
 *
 * @param path1 - First path; symlinks are followed.
 * @param path2 - Second path; symlinks are followed.
 *
 * @throws Node's `ErrnoException` when either path cannot be stat'ed.
 */
export function samefile(path1: string, path2: string): boolean {
	const left = fs.statSync(path1);
	const right = fs.statSync(path2);
	return left.dev === right.dev && left.ino === right.ino;
}
