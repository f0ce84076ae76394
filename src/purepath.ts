import nodepath from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { minimatch } from "minimatch";
import { PathError } from "./errors.js";

/**
 * Whether the host reports Windows-style separators.
 *
 * @remarks
 *
 * Derived from {@link nodepath.sep} once, when the module is evaluated. It picks the parser used by
 * {@link PureRoadPath} and {@link RoadPath}; the explicit flavours ignore it.
 */
export const isWindows = nodepath.sep === "\\";

export const posixParser = nodepath.posix;

export const windowsParser = nodepath.win32;

/**
 * Rewrite the alternate separator of a Windows path to `\`.
 *
 * @remarks
 *
 * POSIX has no alternate separator, so its strings are returned unchanged.
 */
export function normalizeForParser(
	parser: nodepath.PlatformPath,
	value: string,
): string {
	if (parser !== windowsParser) return value;
	return value.replace(/\//g, parser.sep);
}

type ParsedPathParts = {
	drive: string;
	root: string;
	tail: string[];
};

function parsePathString(
	parser: nodepath.PlatformPath,
	value: string,
): ParsedPathParts {
	if (!value) return { drive: "", root: "", tail: [] };
	const normalized = normalizeForParser(parser, value);
	const sep = parser.sep;
	let drive = "";
	let root = "";
	let remainder = normalized;

	if (parser === windowsParser) {
		const uncMatch = remainder.match(/^\\\\([^\\]+)\\([^\\]+)(.*)$/);
		if (uncMatch) {
			// A share is always rooted, with or without a separator after it.
			drive = `\\\\${uncMatch[1]}\\${uncMatch[2]}`;
			root = sep;
			remainder = uncMatch[3] ?? "";
		} else {
			const driveMatch = remainder.match(/^[A-Za-z]:/);
			if (driveMatch) {
				drive = driveMatch[0];
				remainder = remainder.slice(drive.length);
			}
		}
	}
	while (remainder.startsWith(sep)) {
		root = sep;
		remainder = remainder.slice(1);
	}

	const tail = remainder
		.split(sep)
		.filter((fragment) => fragment.length > 0 && fragment !== ".");

	return { drive, root, tail };
}

function normalizeCase(parser: nodepath.PlatformPath, value: string): string {
	return parser === windowsParser ? value.toLowerCase() : value;
}

/**
 * Combine raw segments left to right.
 *
 * A segment with a root restarts the path (keeping the current drive when it names none); a segment
 * on another drive without a root restarts it on that drive.
 */
function parseSegments(
	parser: nodepath.PlatformPath,
	segments: string[],
): ParsedPathParts {
	let drive = "";
	let root = "";
	let tail: string[] = [];
	for (const segment of segments) {
		const part = parsePathString(parser, segment);
		if (part.root) {
			drive = part.drive || drive;
			root = part.root;
			tail = [...part.tail];
		} else if (
			part.drive &&
			normalizeCase(parser, part.drive) !== normalizeCase(parser, drive)
		) {
			drive = part.drive;
			root = "";
			tail = [...part.tail];
		} else {
			tail.push(...part.tail);
		}
	}
	return { drive, root, tail };
}

function formatPathString(
	parser: nodepath.PlatformPath,
	drive: string,
	root: string,
	tail: string[],
): string {
	return drive + root + tail.join(parser.sep);
}

function fnmatch(
	value: string,
	pattern: string,
	caseSensitive: boolean,
): boolean {
	return minimatch(value, pattern, {
		dot: true,
		nocase: !caseSensitive,
		nocomment: true,
		nonegate: true,
		nobrace: true,
		noext: true,
	});
}

/**
 * Sequence of the lexical ancestors of a path, nearest first.
 *
 * @remarks
 *
 * Ends at the anchor for absolute paths and at `.` for relative ones. Anchors and `.` have no parents.
 */
export class PathParents<P extends PureRoadPath> implements Iterable<P> {
	private readonly listing: P[];

	constructor(origin: P) {
		const result: P[] = [];
		let previous = origin;
		let current = origin.parent;
		while (current.toString() !== previous.toString()) {
			result.push(current);
			previous = current;
			current = current.parent;
		}
		this.listing = result;
	}

	[Symbol.iterator](): Iterator<P> {
		return this.listing[Symbol.iterator]();
	}

	at(index: number): P | undefined {
		return this.listing.at(index);
	}

	get length(): number {
		return this.listing.length;
	}
}

/**
 * Inputs accepted wherever a path is expected.
 *
 * @remarks
 *
 * A `URL` must use the `file:` scheme; it is converted with `fileURLToPath`, which throws a
 * `TypeError` for any other scheme.
 */
export type PathLike = string | PureRoadPath | URL;

/**
 * Decomposed fields of a path, as returned by {@link PureRoadPath.parse}.
 *
 * @remarks
 *
 * Fields that do not apply are empty strings or empty arrays. `parent` is the string form of
 * {@link PureRoadPath.parent}.
 */
export interface PathParts {
	drive: string;
	root: string;
	parts: string[];
	name: string;
	stem: string;
	suffix: string;
	suffixes: string[];
	parent: string;
}

/**
 * Immutable path value that never touches the filesystem.
 *
 * @remarks
 *
 * Every operation returns a new instance of the receiver's own class, so a {@link RoadPath} stays a
 * `RoadPath` through `join`, `parent`, `withSuffix` and friends. Parsing follows the parser chosen for
 * the class: the host's by default, or POSIX and Windows rules through {@link PurePosixRoadPath} and
 * {@link PureWindowsRoadPath}.
 *
 * Empty segments and `.` are dropped while parsing, `..` is kept. Use {@link PureRoadPath.normalize} to
 * fold `..` away.
 *
 * @example
 * ```ts
 * import { PureRoadPath } from "roadpath";
 *
 * const archive = new PureRoadPath("/x/y/z.tar.gz");
 * archive.suffixes; // ['.tar', '.gz']
 * archive.withSuffix(".zip").toString(); // '/x/y/z.tar.zip'
 * ```
 */
export class PureRoadPath {
	static parser: nodepath.PlatformPath = isWindows
		? windowsParser
		: posixParser;

	protected rawPaths: string[];
	protected parsedCache?: ParsedPathParts;
	protected strCache?: string;

	constructor(...segments: Array<PathLike>) {
		const parser = (this.constructor as typeof PureRoadPath).parser;
		this.rawPaths = segments.map((segment) => {
			if (segment instanceof URL) return fileURLToPath(segment);
			if (segment instanceof PureRoadPath) return segment.toString();
			return normalizeForParser(parser, segment);
		});
	}

	protected get parser(): nodepath.PlatformPath {
		return (this.constructor as typeof PureRoadPath).parser;
	}

	protected get caseSensitive(): boolean {
		return this.parser === posixParser;
	}

	protected parsed(): ParsedPathParts {
		if (!this.parsedCache) {
			this.parsedCache = parseSegments(this.parser, this.rawPaths);
		}
		return this.parsedCache;
	}

	protected tailParts(): string[] {
		return [...this.parsed().tail];
	}

	protected cloneFromParts(drive: string, root: string, tail: string[]): this {
		const formatted = formatPathString(this.parser, drive, root, tail) || ".";
		const instance = this.withSegments(formatted);
		instance.parsedCache = { drive, root, tail: [...tail] };
		instance.strCache = formatted;
		return instance;
	}

	/**
	 * Build a path of the same concrete class from new segments.
	 *
	 * @remarks
	 *
	 * All derived paths go through here. Override it in a subclass that needs extra constructor state.
	 */
	withSegments(...segments: Array<PathLike>): this {
		const ctor = this.constructor as new (...args: Array<PathLike>) => this;
		return new ctor(...segments);
	}

	/**
	 * Append segments to this path.
	 *
	 * @remarks
	 *
	 * A segment with a root discards everything accumulated before it, as does a segment naming another
	 * drive. This is the counterpart of a `/` join operator.
	 *
	 * @example
	 * ```ts
	 * new PureRoadPath("/srv").join("app", "logs").toString(); // '/srv/app/logs'
	 * new PureRoadPath("/srv").join("/etc", "hosts").toString(); // '/etc/hosts'
	 * ```
	 *
	 * @param segments - Strings, paths or `file:` URLs to append.
	 * @returns A new path of the receiver's class.
	 */
	join(...segments: Array<PathLike>): this {
		return this.withSegments(this, ...segments);
	}

	toString(): string {
		if (this.strCache !== undefined) return this.strCache;
		const { drive, root, tail } = this.parsed();
		this.strCache = formatPathString(this.parser, drive, root, tail) || ".";
		return this.strCache;
	}

	valueOf(): string {
		return this.toString();
	}

	toJSON(): string {
		return this.toString();
	}

	[Symbol.toPrimitive](): string {
		return this.toString();
	}

	/**
	 * The string form with `/` separators regardless of flavour.
	 */
	asPosix(): string {
		if (this.parser === posixParser) return this.toString();
		return this.toString().replace(/\\/g, "/");
	}

	/**
	 * Compare two paths by their parsed string form.
	 *
	 * @remarks
	 *
	 * Trailing separators and `.` segments do not affect equality; `..` does, since it is only removed by
	 * {@link PureRoadPath.normalize}. Windows paths compare case-insensitively. Paths of different
	 * flavours are never equal; strings and URLs are parsed with this path's flavour first.
	 *
	 * @example
	 * ```ts
	 * new PureRoadPath("/a/b").equals("/a/b/"); // true
	 * new PureRoadPath("a/../b").equals("b"); // false
	 * ```
	 *
	 * @param other - Path to compare against.
	 * @returns `true` when both name the same lexical path.
	 */
	equals(other: PathLike): boolean {
		const target =
			other instanceof PureRoadPath ? other : this.withSegments(other);
		if (target.parser !== this.parser) return false;
		return (
			normalizeCase(this.parser, this.toString()) ===
			normalizeCase(this.parser, target.toString())
		);
	}

	/**
	 * Drive prefix of a Windows path (`C:` or `\\server\share`), otherwise `""`.
	 */
	get drive(): string {
		return this.parsed().drive;
	}

	get root(): string {
		return this.parsed().root;
	}

	/**
	 * Drive and root together, or `""` for a relative path.
	 */
	get anchor(): string {
		return this.drive + this.root;
	}

	/**
	 * Components of the path, anchor first when there is one.
	 *
	 * @example
	 * ```ts
	 * new PurePosixRoadPath("/usr/bin/node").parts; // ['/', 'usr', 'bin', 'node']
	 * new PureWindowsRoadPath("c:/Program Files/node").parts; // ['c:\\', 'Program Files', 'node']
	 * ```
	 */
	get parts(): string[] {
		const tail = this.tailParts();
		const anchor = this.anchor;
		return anchor ? [anchor, ...tail] : tail;
	}

	/**
	 * The lexical parent. Anchors and `.` are their own parent.
	 */
	get parent(): this {
		const { drive, root, tail } = this.parsed();
		if (tail.length === 0) return this;
		return this.cloneFromParts(drive, root, tail.slice(0, -1));
	}

	/**
	 * Lexical ancestors, nearest first.
	 *
	 * @example
	 * ```ts
	 * Array.from(new PurePosixRoadPath("/a/b/c").parents, String); // ['/a/b', '/a', '/']
	 * ```
	 */
	get parents(): PathParents<this> {
		return new PathParents(this);
	}

	/**
	 * Final component, or `""` when the path is only an anchor or `.`.
	 */
	get name(): string {
		return this.parsed().tail.at(-1) ?? "";
	}

	/**
	 * Last extension of {@link PureRoadPath.name} with its leading dot.
	 *
	 * @remarks
	 *
	 * A leading dot (`.bashrc`) or a trailing dot (`file.`) does not start a suffix.
	 */
	get suffix(): string {
		const name = this.name;
		const idx = name.lastIndexOf(".");
		if (idx > 0 && idx < name.length - 1) return name.slice(idx);
		return "";
	}

	/**
	 * All extensions of the final component, left to right.
	 */
	get suffixes(): string[] {
		const name = this.name;
		if (name.endsWith(".")) return [];
		const pieces = name.replace(/^\.+/, "").split(".");
		return pieces.slice(1).map((piece) => `.${piece}`);
	}

	/**
	 * Final component without its last suffix.
	 */
	get stem(): string {
		const name = this.name;
		const idx = name.lastIndexOf(".");
		if (idx > 0 && idx < name.length - 1) return name.slice(0, idx);
		return name;
	}

	/**
	 * Decompose the path into a plain {@link PathParts} record.
	 */
	parse(): PathParts {
		return {
			drive: this.drive,
			root: this.root,
			parts: this.parts,
			name: this.name,
			stem: this.stem,
			suffix: this.suffix,
			suffixes: this.suffixes,
			parent: this.parent.toString(),
		};
	}

	/**
	 * Replace the final component.
	 *
	 * @param name - New final component; must not contain a separator.
	 * @returns A sibling path with the given name.
	 * @throws {@link PathError} `invalid-name` for an empty name, `.`, or a name with a separator;
	 * `empty-name` when this path has no final component.
	 */
	withName(name: string): this {
		const parser = this.parser;
		if (
			!name ||
			name === "." ||
			name.includes(parser.sep) ||
			(parser === windowsParser && name.includes("/"))
		) {
			throw new PathError("invalid-name", `Invalid name ${name}`, {
				path: this.toString(),
			});
		}
		const { drive, root, tail } = this.parsed();
		if (tail.length === 0) {
			throw new PathError("empty-name", `${this.toString()} has an empty name`, {
				path: this.toString(),
			});
		}
		return this.cloneFromParts(drive, root, [...tail.slice(0, -1), name]);
	}

	/**
	 * Replace (or with `""` remove) the last suffix.
	 *
	 * @param suffix - New suffix including its leading dot, or `""`.
	 * @returns A sibling path with the suffix swapped.
	 * @throws {@link PathError} `invalid-suffix` unless the suffix is empty or a dot followed by text;
	 * `empty-name` when the path has no stem.
	 */
	withSuffix(suffix: string): this {
		if (suffix && (!suffix.startsWith(".") || suffix === ".")) {
			throw new PathError("invalid-suffix", `Invalid suffix ${suffix}`, {
				path: this.toString(),
			});
		}
		const stem = this.stem;
		if (!stem) {
			throw new PathError("empty-name", `${this.toString()} has an empty name`, {
				path: this.toString(),
			});
		}
		return this.withName(`${stem}${suffix}`);
	}

	/**
	 * Replace the stem, keeping the current suffix.
	 *
	 * @param stem - New name without its suffix.
	 * @returns A sibling path with the stem swapped.
	 * @throws {@link PathError} `empty-name` when `stem` is empty but a suffix would remain.
	 */
	withStem(stem: string): this {
		const suffix = this.suffix;
		if (!suffix) return this.withName(stem);
		if (!stem) {
			throw new PathError(
				"empty-name",
				`${this.toString()} has a non-empty suffix`,
				{ path: this.toString() },
			);
		}
		return this.withName(`${stem}${suffix}`);
	}

	/**
	 * Express this path relative to `other`.
	 *
	 * @remarks
	 *
	 * Purely lexical: neither path is normalized first, so `..` segments are compared as written. With
	 * `walkUp` the result may climb out of `other` through `..` segments.
	 *
	 * @param other - Base path.
	 * @param options - `walkUp` permits `..` segments in the result.
	 * @returns A relative path of the receiver's class.
	 * @throws {@link PathError} `different-anchors` when one path is absolute and the other is not (or
	 * drives differ); `not-relative` when `other` is not an ancestor and `walkUp` is off.
	 */
	relativeTo(other: PathLike, options?: { walkUp?: boolean }): this {
		const target =
			other instanceof PureRoadPath ? other : this.withSegments(other);
		if (
			normalizeCase(this.parser, this.anchor) !==
			normalizeCase(this.parser, target.anchor)
		) {
			throw new PathError(
				"different-anchors",
				`${this.toString()} and ${target.toString()} have different anchors`,
				{ path: this.toString(), other: target.toString() },
			);
		}
		const thisTail = this.tailParts();
		const otherTail = target.tailParts();
		let index = 0;
		const max = Math.min(thisTail.length, otherTail.length);
		while (index < max) {
			const left = normalizeCase(this.parser, thisTail[index] ?? "");
			const right = normalizeCase(this.parser, otherTail[index] ?? "");
			if (left !== right) break;
			index += 1;
		}
		if (index < otherTail.length) {
			if (!options?.walkUp || otherTail.slice(index).includes("..")) {
				throw new PathError(
					"not-relative",
					`${this.toString()} is not in the subpath of ${target.toString()}`,
					{ path: this.toString(), other: target.toString() },
				);
			}
		}
		const ups = new Array<string>(otherTail.length - index).fill("..");
		return this.cloneFromParts("", "", [...ups, ...thisTail.slice(index)]);
	}

	/**
	 * Whether {@link PureRoadPath.relativeTo} would succeed without `walkUp`.
	 */
	isRelativeTo(other: PathLike): boolean {
		try {
			this.relativeTo(other);
			return true;
		} catch (error) {
			if (error instanceof PathError) return false;
			throw error;
		}
	}

	/**
	 * Whether the path has a root, and on Windows a drive as well. UNC shares count as rooted.
	 */
	isAbsolute(): boolean {
		if (this.parser === windowsParser) {
			return Boolean(this.drive) && Boolean(this.root);
		}
		return Boolean(this.root);
	}

	/**
	 * Collapse `.` and `..` segments and redundant separators without touching the filesystem.
	 */
	normalize(): this {
		return this.withSegments(this.parser.normalize(this.toString()));
	}

	/**
	 * Test the path against a glob pattern, component by component from the right.
	 *
	 * @remarks
	 *
	 * A relative pattern matches the trailing components; an anchored pattern must cover the whole
	 * path. Each component supports `*`, `?`, `[seq]` and `[!seq]`; braces and extglob groups are
	 * matched literally. Windows paths match case-insensitively unless `caseSensitive` says otherwise.
	 * An empty pattern never matches.
	 *
	 * @example
	 * ```ts
	 * const p = new PureRoadPath("a/b/c.txt");
	 * p.match("*.txt"); // true
	 * p.match("b/*.txt"); // true
	 * p.match("a/*.txt"); // false
	 * ```
	 *
	 * @param pattern - Glob pattern, parsed with this path's flavour.
	 * @param options - Override the flavour's case sensitivity.
	 * @returns Whether the trailing components match.
	 */
	match(pattern: PathLike, options?: { caseSensitive?: boolean }): boolean {
		const patternPath =
			pattern instanceof PureRoadPath ? pattern : this.withSegments(pattern);
		const caseSensitive = options?.caseSensitive ?? this.caseSensitive;
		const patternTail = patternPath.tailParts();
		const tail = this.tailParts();
		if (!patternPath.anchor && patternTail.length === 0) return false;
		if (patternPath.anchor) {
			if (
				normalizeCase(this.parser, patternPath.anchor) !==
				normalizeCase(this.parser, this.anchor)
			) {
				return false;
			}
			if (patternTail.length !== tail.length) return false;
		} else if (patternTail.length > tail.length) {
			return false;
		}
		const offset = tail.length - patternTail.length;
		return patternTail.every((component, index) =>
			fnmatch(tail[offset + index] ?? "", component, caseSensitive),
		);
	}

	/**
	 * Test the whole path against a glob pattern in which `**` spans any number of components.
	 *
	 * @param pattern - Glob pattern, compared in its `/`-separated form.
	 * @param options - Override the flavour's case sensitivity.
	 */
	fullMatch(pattern: PathLike, options?: { caseSensitive?: boolean }): boolean {
		const patternPath =
			pattern instanceof PureRoadPath ? pattern : this.withSegments(pattern);
		const caseSensitive = options?.caseSensitive ?? this.caseSensitive;
		return fnmatch(this.asPosix(), patternPath.asPosix(), caseSensitive);
	}

	/**
	 * The path as a `file:` URI.
	 *
	 * @throws {@link PathError} `relative-uri` for a relative path.
	 */
	asURI(): string {
		if (!this.isAbsolute()) {
			throw new PathError(
				"relative-uri",
				"relative path can't be expressed as a file URI",
				{ path: this.toString() },
			);
		}
		return pathToFileURL(this.toString()).toString();
	}

	/**
	 * Build a path from a `file:` URI.
	 *
	 * @param uri - Absolute `file:` URI.
	 * @throws `TypeError` from `fileURLToPath` for any other scheme.
	 */
	static fromURI(uri: string): PureRoadPath {
		return new PureRoadPath(fileURLToPath(uri));
	}
}

/**
 * Lexical path using POSIX rules on any host.
 */
export class PurePosixRoadPath extends PureRoadPath {
	static override parser = posixParser;
}

/**
 * Lexical path using Windows drive and separator rules on any host.
 */
export class PureWindowsRoadPath extends PureRoadPath {
	static override parser = windowsParser;
}
