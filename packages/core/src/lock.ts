import { RouteLockError } from "./errors";

/**
 * Readers/writer guard over the route trees.
 *
 * Every call made under it is synchronous, so readers never overlap a writer on
 * Node's event loop except through re-entry: a callback running inside a read that
 * tries to register a route. That write is rejected instead of mutating a tree
 * which is still being iterated. Writes call nothing outside the tree, so no read
 * can start during one.
 */
export class RouteLock {
	private readers = 0;

	read<R>(fn: () => R): R {
		this.readers++;
		try {
			return fn();
		} finally {
			this.readers--;
		}
	}

	write<R>(fn: () => R): R {
		if (this.readers > 0) {
			throw new RouteLockError();
		}
		return fn();
	}
}
