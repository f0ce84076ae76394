import fs from "node:fs";
import os from "node:os";
import nodepath from "node:path";

export type Sandbox = {
	root: string;
	realRoot: string;
	cleanup: () => void;
	canSymlink: boolean;
};

export const isPosixHost = nodepath.sep === "/";

export function makeSandbox(prefix = "roadpath-"): Sandbox {
	const base = fs.mkdtempSync(nodepath.join(os.tmpdir(), prefix));
	const cleanup = () => {
		fs.rmSync(base, { recursive: true, force: true });
	};

	// base/
	//   fileA
	//   dirB/
	//     fileB
	//   dirC/
	//     .hidden
	//     dirD/
	//       fileD
	//     novel.txt
	//   linkA -> fileA (if possible)
	//   linkB -> dirB (if possible)
	//   deep -> dirC/dirD (if possible)
	//   brokenLink -> non-existing (if possible)
	//   loopA -> loopB -> loopA (if possible)
	fs.mkdirSync(nodepath.join(base, "dirB"), { recursive: true });
	fs.mkdirSync(nodepath.join(base, "dirC", "dirD"), { recursive: true });
	fs.writeFileSync(nodepath.join(base, "fileA"), "hello A\n", "utf8");
	fs.writeFileSync(nodepath.join(base, "dirB", "fileB"), "hello B\n", "utf8");
	fs.writeFileSync(
		nodepath.join(base, "dirC", "dirD", "fileD"),
		"hello D\n",
		"utf8",
	);
	fs.writeFileSync(nodepath.join(base, "dirC", ".hidden"), "", "utf8");
	fs.writeFileSync(
		nodepath.join(base, "dirC", "novel.txt"),
		"lorem ipsum\n",
		"utf8",
	);

	let canSymlink = true;
	try {
		fs.symlinkSync("fileA", nodepath.join(base, "linkA"));
		fs.symlinkSync("dirB", nodepath.join(base, "linkB"));
		fs.symlinkSync(
			nodepath.join("dirC", "dirD"),
			nodepath.join(base, "deep"),
		);
		fs.symlinkSync("non-existing", nodepath.join(base, "brokenLink"));
		fs.symlinkSync("loopB", nodepath.join(base, "loopA"));
		fs.symlinkSync("loopA", nodepath.join(base, "loopB"));
	} catch {
		canSymlink = false;
		for (const name of [
			"linkA",
			"linkB",
			"deep",
			"brokenLink",
			"loopA",
			"loopB",
		]) {
			fs.rmSync(nodepath.join(base, name), { force: true });
		}
	}

	return { root: base, realRoot: fs.realpathSync(base), cleanup, canSymlink };
}

/**
 * Run `fn` and return what it throws; fail the test when it returns normally.
 */
export function captureError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error("expected the call to throw");
}

export const sortStrings = (values: Iterable<unknown>): string[] =>
	Array.from(values, String).sort();
