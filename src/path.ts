import fs, { type Stats } from "node:fs";
import nodeos from "node:os";
import nodepath from "node:path";
import { globSync } from "glob";
import { PathError } from "./errors.js";
import { PureRoadPath } from "./purepath.js";
import { toPromise } from "./util.js";

function isMissingEntryError(error: unknown): boolean {
	if (typeof error !== "object" || error === null || !("code" in error)) {
		return false;
	}
	return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * `realpath` that tolerates a missing trailing part.
 *
 * The longest existing prefix is canonicalised; the components after it are appended as written.
 * Any failure other than a missing entry (`ELOOP`, `EACCES`) is rethrown.
 */
function realpathLenient(
	parser: nodepath.PlatformPath,
	target: string,
): string {
	try {
		return fs.realpathSync.native(target);
	} catch (error) {
		if (!isMissingEntryError(error)) throw error;
		const parent = parser.dirname(target);
		if (parent === target) throw error;
		return parser.join(
			realpathLenient(parser, parent),
			parser.basename(target),
		);
	}
}

/**
 * Path value with filesystem queries on top of {@link PureRoadPath}.
 *
 * @remarks
 *
 * Uses the host's parser. Every filesystem query comes as a blocking `Sync` method and as a
 * promise-returning twin built on it, so callers in a server can keep the call off their hot path
 * without this library owning any concurrency. Predicates (`existsSync`, `isFileSync`, `isDirSync`,
 * `isSymlinkSync`) answer `false` for a missing entry; everything else lets Node's error through
 * unchanged.
 *
 * @example
 * ```ts
 * import { RoadPath } from "roadpath";
 *
 * const config = RoadPath.home().join(".config", "app", "settings.json");
 * if (await config.isFile()) {
 *   console.log(config.parent.toString());
 * }
 * ```
 */
export class RoadPath extends PureRoadPath {
	/**
	 * The current working directory, read again on every call.
	 */
	static cwd(): RoadPath {
		return new RoadPath(process.cwd());
	}

	/**
	 * The current user's home directory.
	 *
	 * @remarks
	 *
	 * `os.homedir()` consults `HOME` (or `USERPROFILE` on Windows) before the user database.
	 *
	 * @throws {@link Error} When the platform reports no home directory.
	 */
	static home(): RoadPath {
		const home = nodeos.homedir();
		if (!home) throw new Error("Could not determine home directory");
		return new RoadPath(home);
	}

	/**
	 * The platform's temporary directory.
	 */
	static temp(): RoadPath {
		return new RoadPath(nodeos.tmpdir());
	}

	/**
	 * This path made absolute against the current working directory.
	 *
	 * @remarks
	 *
	 * Lexical: `..` segments are kept and symlinks are not followed. Use {@link RoadPath.resolve} for a
	 * canonical path.
	 */
	absolute(): RoadPath {
		if (this.isAbsolute()) return this;
		return RoadPath.cwd().join(this);
	}

	/**
	 * Make the path absolute, follow symlinks, and collapse `.` and `..`.
	 *
	 * @remarks
	 *
	 * Symlinks are followed before `..` is applied, so `link/..` names the parent of the link's
	 * target. Components past the last existing entry are appended unchanged, so the result need not
	 * exist.
	 *
	 * @returns The canonical absolute path.
	 * @throws Node's `ErrnoException` for failures other than a missing entry, such as a symlink loop.
	 */
	resolveSync(): RoadPath {
		return this.withSegments(
			realpathLenient(this.parser, this.absolute().toString()),
		);
	}

	/**
	 * Promise form of {@link RoadPath.resolveSync}.
	 *
	 * @returns A promise resolving to the canonical absolute path.
	 */
	resolve(): Promise<RoadPath> {
		return toPromise(() => this.resolveSync());
	}

	/**
	 * `fs.statSync` (or `fs.lstatSync` with `followSymlinks: false`) on this path.
	 *
	 * @param options - Set `followSymlinks: false` to describe a link rather than its target.
	 * @returns The raw `fs.Stats`.
	 * @throws Node's `ErrnoException`, unwrapped.
	 */
	statSync(options?: { followSymlinks?: boolean }): Stats {
		const follow = options?.followSymlinks ?? true;
		return follow
			? fs.statSync(this.toString())
			: fs.lstatSync(this.toString());
	}

	/**
	 * Promise form of {@link RoadPath.statSync}; rejects with Node's error.
	 */
	stat(options?: { followSymlinks?: boolean }): Promise<Stats> {
		return toPromise(() => this.statSync(options));
	}

	private statOrNull(followSymlinks: boolean): Stats | null {
		try {
			return this.statSync({ followSymlinks });
		} catch {
			return null;
		}
	}

	/**
	 * Whether anything exists at this path. A dangling symlink only counts with
	 * `followSymlinks: false`.
	 *
	 * @param options - Optional follow-symlink toggle.
	 * @returns `false` for any stat failure.
	 */
	existsSync(options?: { followSymlinks?: boolean }): boolean {
		return this.statOrNull(options?.followSymlinks ?? true) !== null;
	}

	exists(options?: { followSymlinks?: boolean }): Promise<boolean> {
		return toPromise(() => this.existsSync(options));
	}

	/**
	 * Whether the path is a regular file, following symlinks unless told otherwise.
	 *
	 * @param options - Optional follow-symlink toggle.
	 */
	isFileSync(options?: { followSymlinks?: boolean }): boolean {
		return (
			this.statOrNull(options?.followSymlinks ?? true)?.isFile() ?? false
		);
	}

	isFile(options?: { followSymlinks?: boolean }): Promise<boolean> {
		return toPromise(() => this.isFileSync(options));
	}

	/**
	 * Whether the path is a directory, following symlinks unless told otherwise.
	 *
	 * @param options - Optional follow-symlink toggle.
	 */
	isDirSync(options?: { followSymlinks?: boolean }): boolean {
		return (
			this.statOrNull(options?.followSymlinks ?? true)?.isDirectory() ?? false
		);
	}

	isDir(options?: { followSymlinks?: boolean }): Promise<boolean> {
		return toPromise(() => this.isDirSync(options));
	}

	/**
	 * Whether the path itself is a symbolic link, dangling or not.
	 */
	isSymlinkSync(): boolean {
		return this.statOrNull(false)?.isSymbolicLink() ?? false;
	}

	isSymlink(): Promise<boolean> {
		return toPromise(() => this.isSymlinkSync());
	}

	/**
	 * Entries below this directory matching a pattern relative to it.
	 *
	 * @remarks
	 *
	 * Patterns use `/` on every host and support `*`, `?`, `**`, `[seq]` and `[!seq]`. Braces and
	 * extglob groups are literal characters. Hidden entries are included, results come back in directory
	 * enumeration order (unsorted), and a missing directory yields no matches.
	 *
	 * @param pattern - Glob relative to this directory.
	 * @returns Matching entries joined onto this path.
	 * @throws {@link PathError} `invalid-pattern` for an empty pattern.
	 *
	 * @example
	 * ```ts
	 * new RoadPath("src").globSync("*.ts").map(String); // ['src/index.ts', 'src/path.ts', ...]
	 * ```
	 */
	globSync(pattern: string): RoadPath[] {
		if (!pattern) {
			throw new PathError("invalid-pattern", "Unacceptable pattern: ''", {
				path: this.toString(),
			});
		}
		const matches = globSync(pattern, {
			cwd: this.toString(),
			dot: true,
			nobrace: true,
			noext: true,
			windowsPathsNoEscape: this.parser.sep === "\\",
		});
		return matches.map((match) => this.join(match));
	}

	/**
	 * Promise form of {@link RoadPath.globSync}.
	 *
	 * @param pattern - Glob relative to this directory.
	 */
	glob(pattern: string): Promise<RoadPath[]> {
		return toPromise(() => this.globSync(pattern));
	}

	/**
	 * {@link RoadPath.globSync} at any depth: the pattern is prefixed with `**` + `/`.
	 *
	 * @param pattern - Glob matched against entries at every depth below this directory.
	 * @throws {@link PathError} `invalid-pattern` for an empty pattern.
	 */
	rglobSync(pattern: string): RoadPath[] {
		if (!pattern) {
			throw new PathError("invalid-pattern", "Unacceptable pattern: ''", {
				path: this.toString(),
			});
		}
		return this.globSync(`**/${pattern}`);
	}

	rglob(pattern: string): Promise<RoadPath[]> {
		return toPromise(() => this.rglobSync(pattern));
	}
}
