/**
 * Base class for errors raised by the router at registration time.
 */
export class RouterError extends Error {
	constructor(message: string, public readonly code: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Thrown when a route path does not begin with "/". The route tree is left untouched.
 */
export class InvalidPathError extends RouterError {
	constructor(public readonly path: string) {
		super(`Path "${path}" does not begin with a leading slash`, "INVALID_PATH");
	}
}

/**
 * Thrown when a path parameter is registered where a parameter with another name already exists.
 *
 * Registration is not transactional: literal segments created before the conflicting
 * parameter was reached stay in the tree. They carry no handler, so they never serve on
 * their own, but they do take part in trailing-slash redirect decisions.
 */
export class RouteConflictError extends RouterError {
	constructor(
		public readonly path: string,
		public readonly existingParam: string,
		public readonly requestedParam: string
	) {
		super(`Path parameter ":${requestedParam}" of "${path}" is already defined as ":${existingParam}"`, "ROUTE_CONFLICT");
	}
}

/**
 * Thrown when a route is registered while the route tree is being read under the route lock.
 */
export class RouteLockError extends RouterError {
	constructor() {
		super("Cannot register a route while the route tree is being read", "ROUTE_LOCKED");
	}
}
