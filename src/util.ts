/**
 * Run a synchronous path operation and hand its outcome back as a {@link Promise}.
 *
 * @remarks
 *
 * Filesystem queries on {@link RoadPath} are implemented once, synchronously, and exposed a second time
 * without the `Sync` suffix through this helper. A thrown error becomes a rejected promise instead of
 * escaping synchronously from an `async`-looking call.
 *
 * @example
 * ```ts
 * import { RoadPath, toPromise } from "roadpath";
 *
 * const present = await toPromise(() => new RoadPath("package.json").existsSync());
 * ```
 */
export function toPromise<T>(factory: () => T): Promise<T> {
	try {
		return Promise.resolve(factory());
	} catch (error) {
		return Promise.reject(error);
	}
}
