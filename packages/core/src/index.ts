import type { IncomingMessage, ServerResponse } from "node:http";
import { TLSSocket } from "node:tls";
import { Levels } from "@rabbit-company/logger";
import { RouterError } from "./errors";
import { RouteLock } from "./lock";
import { RouteTree, type RouteNode } from "./tree";
import type { Context, ErrorHandler, Handler, Method, Params, RouteInfo, RouteMatch, RouterLogger, RouterOptions } from "./types";

/** Methods the router accepts routes for, in the order the registration helpers are declared */
export const METHODS: readonly Method[] = ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS", "TRACE"];

/** Methods the Fetch API refuses to put on a `Request` */
const FORBIDDEN_FETCH_METHODS = new Set(["CONNECT", "TRACE", "TRACK"]);

/** Shared result for every request that matches no route */
const NOT_FOUND: RouteMatch = Object.freeze({ type: "not-found" as const });

/**
 * Checks whether a request method is one routes can be registered for.
 */
export function isMethod(method: string): method is Method {
	return METHODS.some((m) => m === method);
}

/**
 * Tree-based HTTP router with named path parameters and trailing-slash redirects.
 *
 * Features:
 * - One route tree per HTTP method
 * - Named segments (`/users/:id`) captured into a per-request params object
 * - Literal segments take priority over a parameter at the same position
 * - Redirects between `/foo` and `/foo/` when only one of them is registered
 * - Fetch API (`handle`) and Node.js `http` (`handleNode`) entry points
 *
 * @example
 * ```typescript
 * const router = new Router();
 *
 * router.get("/users/:id", (ctx) => ctx.json({ id: ctx.params.id }));
 * router.get("/docs/", (ctx) => ctx.html("<h1>Docs</h1>"));
 *
 * // GET /users/42 -> 200 {"id":"42"}
 * // GET /docs     -> 301 Location: /docs/
 * createServer(router.handleNode).listen(3000);
 * ```
 */
export class Router {
	/** Redirect requests that differ from a registered route only by a trailing slash */
	redirectTrailingSlash: boolean;
	/** Take the route lock on registration and lookup */
	concurrentAdd: boolean;

	/** Route trees keyed by HTTP method, created on first registration */
	private trees = new Map<Method, RouteTree>();
	/** Successfully registered routes, in registration order */
	private routes: RouteInfo[] = [];
	private lock = new RouteLock();
	private logger?: RouterLogger;

	/** Error handler function for handling errors thrown by route handlers */
	private errorHandler?: ErrorHandler;
	/** 404 Not Found handler function */
	private notFoundHandler?: Handler;

	/**
	 * Creates a new Router
	 */
	constructor(options: RouterOptions = {}) {
		const { redirectTrailingSlash = true, concurrentAdd = true, logger } = options;
		this.redirectTrailingSlash = redirectTrailingSlash;
		this.concurrentAdd = concurrentAdd;
		this.logger = logger;

		this.handle = this.handle.bind(this);
		this.handleNode = this.handleNode.bind(this);
	}

	/**
	 * Sets a handler for errors thrown by route handlers.
	 *
	 * @example
	 * ```typescript
	 * router.onError((err, ctx) => ctx.json({ error: err.message }, 500));
	 * ```
	 */
	onError(handler: ErrorHandler): this {
		this.errorHandler = handler;
		return this;
	}

	/**
	 * Sets a custom handler for requests that match no route.
	 *
	 * @example
	 * ```typescript
	 * router.onNotFound((ctx) => ctx.json({ error: "Not Found", path: new URL(ctx.req.url).pathname }, 404));
	 * ```
	 */
	onNotFound(handler: Handler): this {
		this.notFoundHandler = handler;
		return this;
	}

	/**
	 * Runs `fn` under the shared side of the route lock, or directly when `concurrentAdd` is off.
	 */
	private read<R>(fn: () => R): R {
		return this.concurrentAdd ? this.lock.read(fn) : fn();
	}

	/**
	 * Runs `fn` under the exclusive side of the route lock, or directly when `concurrentAdd` is off.
	 */
	private write<R>(fn: () => R): R {
		return this.concurrentAdd ? this.lock.write(fn) : fn();
	}

	/**
	 * Registers a route for the given method.
	 * Registering the same method and path again replaces the handler. A `null` handler keeps
	 * the path in the tree, where it affects trailing-slash redirects, but never serves a request.
	 *
	 * A rejected registration is not rolled back. A conflict is only found on a node that
	 * already existed, so no nodes are created before it is thrown.
	 *
	 * @throws {InvalidPathError} If the path does not start with "/"
	 * @throws {RouteConflictError} If a `:param` segment disagrees with the parameter name already defined at that position
	 * @throws {RouteLockError} If called while the routes are being read
	 *
	 * @example
	 * ```typescript
	 * router.addRoute("GET", "/users/:id", (ctx) => ctx.json({ id: ctx.params.id }));
	 * ```
	 */
	addRoute(method: Method, path: string, handler: Handler | null): this {
		try {
			this.write(() => {
				const tree = this.trees.get(method) ?? new RouteTree();
				tree.insert(path, handler);
				this.trees.set(method, tree);
			});
		} catch (err) {
			if (err instanceof RouterError) {
				this.logger?.log(Levels.WARN, `Rejected route ${method} ${path}: ${err.message}`, { code: err.code });
			}
			throw err;
		}

		if (!this.routes.some((route) => route.method === method && route.path === path)) {
			this.routes.push({ method, path });
		}
		this.logger?.log(Levels.DEBUG, `Registered route ${method} ${path}`, { hasHandler: handler !== null });
		return this;
	}

	/**
	 * Registers a GET route handler.
	 *
	 * @example
	 * ```typescript
	 * router.get("/users/:id", async (ctx) => ctx.json(await getUserById(ctx.params.id)));
	 * ```
	 */
	get(path: string, handler: Handler | null): this {
		return this.addRoute("GET", path, handler);
	}

	/**
	 * Registers a POST route handler.
	 */
	post(path: string, handler: Handler | null): this {
		return this.addRoute("POST", path, handler);
	}

	/**
	 * Registers a PUT route handler.
	 */
	put(path: string, handler: Handler | null): this {
		return this.addRoute("PUT", path, handler);
	}

	/**
	 * Registers a PATCH route handler.
	 */
	patch(path: string, handler: Handler | null): this {
		return this.addRoute("PATCH", path, handler);
	}

	/**
	 * Registers a DELETE route handler.
	 */
	delete(path: string, handler: Handler | null): this {
		return this.addRoute("DELETE", path, handler);
	}

	/**
	 * Registers a HEAD route handler. Responses are sent without a body.
	 */
	head(path: string, handler: Handler | null): this {
		return this.addRoute("HEAD", path, handler);
	}

	/**
	 * Registers an OPTIONS route handler.
	 */
	options(path: string, handler: Handler | null): this {
		return this.addRoute("OPTIONS", path, handler);
	}

	/**
	 * Registers a TRACE route handler.
	 * The Fetch API refuses to build TRACE requests, so these routes are served through `handleNode`,
	 * where `ctx.method` carries the request method.
	 */
	trace(path: string, handler: Handler | null): this {
		return this.addRoute("TRACE", path, handler);
	}

	/**
	 * Matches a method and path against the registered routes.
	 *
	 * @param method - HTTP method to match
	 * @param path - URL path to match, without query string
	 * @returns The handler and its captured params, a redirect location, or not-found
	 *
	 * @example
	 * ```typescript
	 * router.get("/a", handler).get("/b/", handler);
	 *
	 * router.match("GET", "/a");  // { type: "found", handler, params: {} }
	 * router.match("GET", "/a/"); // { type: "redirect", location: "/a" }
	 * router.match("GET", "/b");  // { type: "redirect", location: "/b/" }
	 * router.match("GET", "/c");  // { type: "not-found" }
	 * ```
	 */
	match(method: Method, path: string): RouteMatch {
		return this.read(() => this.findRoute(method, path));
	}

	private findRoute(method: Method, path: string): RouteMatch {
		const tree = this.trees.get(method);
		if (!tree || path[0] !== "/") return NOT_FOUND;

		const params: Params = {};
		const { node, previous, deadEnd } = tree.lookup(path, params);
		if (deadEnd) return NOT_FOUND;

		if (node?.handler) {
			return { type: "found", handler: node.handler, params };
		}

		if (!this.redirectTrailingSlash) return NOT_FOUND;
		return trailingSlashRedirect(path, node, previous);
	}

	/**
	 * Renders the registered route hierarchy, one line per node. Lines of nodes that carry a
	 * handler start with "* ". Methods appear in the order they were first registered.
	 *
	 * @param write - Called with each line as it is rendered
	 * @returns All rendered lines
	 *
	 * @example
	 * ```typescript
	 * router.get("/", home).get("/users/:id", user);
	 * router.printRoutes(console.log);
	 * //   GET
	 * // *   /
	 * //     /users
	 * // *     /:id
	 * ```
	 */
	printRoutes(write?: (line: string) => void): string[] {
		return this.read(() => {
			const lines: string[] = [];
			for (const [method, tree] of this.trees) {
				for (const line of tree.lines(method)) {
					lines.push(line);
					write?.(line);
				}
			}
			return lines;
		});
	}

	/**
	 * Gets all registered routes in registration order.
	 *
	 * @example
	 * ```typescript
	 * router.getRoutes().forEach((route) => console.log(`${route.method} ${route.path}`));
	 * ```
	 */
	getRoutes(): RouteInfo[] {
		return this.routes.map((route) => ({ ...route }));
	}

	/**
	 * Creates a context object for the current request with helper methods.
	 * @private
	 */
	private createContext(method: string, req: Request, params: Params): Context {
		const responseHeaders = new Headers();

		const respond = (body: string | null | undefined, status: number, contentType: string, headers?: Record<string, string>) => {
			const allHeaders = new Headers(responseHeaders);
			allHeaders.set("Content-Type", contentType);
			if (headers) {
				for (const [name, value] of Object.entries(headers)) {
					allHeaders.set(name, value);
				}
			}
			return new Response(body, { status, headers: allHeaders });
		};

		return {
			req,
			method,
			params,
			header: (name, value) => {
				responseHeaders.set(name, value);
			},
			text: (data, status = 200, headers) => respond(data, status, "text/plain", headers),
			json: (data, status = 200, headers) => respond(JSON.stringify(data), status, "application/json", headers),
			html: (html, status = 200, headers) => respond(html, status, "text/html; charset=utf-8", headers),
			redirect: (url, status = 302) => {
				const headers = new Headers(responseHeaders);
				headers.set("Location", url);
				return new Response(null, { status, headers });
			},
		};
	}

	/**
	 * Creates a 404 Not Found response using the custom handler if set.
	 * @private
	 */
	private async createNotFoundResponse(method: string, req: Request): Promise<Response> {
		if (this.notFoundHandler) {
			return this.notFoundHandler(this.createContext(method, req, {}));
		}
		return new Response("Not Found", { status: 404 });
	}

	/**
	 * Main request handler. Invokes the matched route handler, answers with a redirect when the
	 * request only differs from a route by its trailing slash, or answers 404.
	 * Never rejects: handler errors go to the `onError` handler or become a 500 response.
	 *
	 * Redirects use 301 for GET and HEAD and 307 for every other method, so clients repeat
	 * the method and body. The query string is carried over to the Location header.
	 *
	 * @example
	 * ```typescript
	 * const res = await router.handle(new Request("http://localhost/users/42"));
	 * ```
	 */
	async handle(req: Request): Promise<Response> {
		return this.dispatch(req.method, req);
	}

	/**
	 * Routes a request by `method`, which differs from `req.method` only for methods the
	 * Fetch API cannot carry.
	 * @private
	 */
	private async dispatch(method: string, req: Request): Promise<Response> {
		const url = new URL(req.url);
		let params: Params = {};

		try {
			const matched = isMethod(method) ? this.match(method, url.pathname) : NOT_FOUND;

			if (matched.type === "redirect") {
				const status = method === "GET" || method === "HEAD" ? 301 : 307;
				this.logger?.log(Levels.DEBUG, `Redirecting ${method} ${url.pathname} to ${matched.location}`, { status });
				return new Response(null, {
					status,
					headers: { Location: matched.location + url.search },
				});
			}

			if (matched.type === "not-found") {
				this.logger?.log(Levels.DEBUG, `No route for ${method} ${url.pathname}`);
				return await this.createNotFoundResponse(method, req);
			}

			params = matched.params;
			const result: unknown = await matched.handler(this.createContext(method, req, params));
			if (!(result instanceof Response)) {
				throw new Error("No response returned by handler");
			}

			if (method === "HEAD") {
				// Strip the body for HEAD requests
				return new Response(null, { status: result.status, headers: result.headers });
			}
			return result;
		} catch (err) {
			const error = err instanceof Error ? err : new Error(String(err));
			this.logger?.log(Levels.ERROR, `Error handling ${method} ${url.pathname}: ${error.message}`, {
				error: { name: error.name, message: error.message, stack: error.stack },
			});
			return this.createErrorResponse(error, method, req, params);
		}
	}

	/**
	 * Creates the response for an error thrown while handling a request, using the custom handler if set.
	 * @private
	 */
	private async createErrorResponse(error: Error, method: string, req: Request, params: Params): Promise<Response> {
		if (this.errorHandler) {
			try {
				return await this.errorHandler(error, this.createContext(method, req, params));
			} catch (handlerErr) {
				this.logger?.log(Levels.ERROR, "Error handler failed", {
					error: handlerErr instanceof Error ? handlerErr.message : String(handlerErr),
				});
			}
		}
		return new Response("Internal Server Error", { status: 500 });
	}

	/**
	 * Request handler for Node.js `http` and `https` servers.
	 * Converts the incoming message to a Fetch API Request, routes it and writes the Response back.
	 * Methods the Fetch API forbids (TRACE, CONNECT) are routed by their real method, with a
	 * bodiless `ctx.req` standing in for the request.
	 *
	 * @example
	 * ```typescript
	 * import { createServer } from "node:http";
	 *
	 * createServer(router.handleNode).listen(3000);
	 * ```
	 */
	async handleNode(req: IncomingMessage, res: ServerResponse): Promise<void> {
		try {
			const host = req.headers.host ?? "localhost";
			const protocol = req.socket instanceof TLSSocket ? "https" : "http";
			const url = `${protocol}://${host}${req.url ?? "/"}`;
			const method = req.method ?? "GET";

			const headers = new Headers();
			for (const [key, value] of Object.entries(req.headers)) {
				if (Array.isArray(value)) {
					value.forEach((v) => headers.append(key, v));
				} else if (value !== undefined) {
					headers.set(key, value);
				}
			}

			const fetchable = !FORBIDDEN_FETCH_METHODS.has(method);
			let body: Buffer | null = null;
			if (fetchable && method !== "GET" && method !== "HEAD") {
				const chunks: Buffer[] = [];
				await new Promise<void>((resolve, reject) => {
					req.on("data", (chunk: Buffer) => chunks.push(chunk));
					req.on("end", () => resolve());
					req.on("error", reject);
				});

				if (chunks.length > 0) {
					body = Buffer.concat(chunks);
				}
			}

			const request = fetchable ? new Request(url, { method, headers, body }) : new Request(url, { headers });
			const response = await this.dispatch(method, request);

			response.headers.forEach((value, key) => {
				res.setHeader(key, value);
			});
			res.writeHead(response.status);

			if (response.body) {
				const reader = response.body.getReader();
				try {
					while (true) {
						const { done, value } = await reader.read();
						if (done) break;
						res.write(value);
					}
				} finally {
					reader.releaseLock();
				}
			}

			res.end();
		} catch (error) {
			this.logger?.log(Levels.ERROR, `Failed to serve ${req.method} ${req.url}`, {
				error: error instanceof Error ? error.message : String(error),
			});
			if (!res.headersSent) {
				res.writeHead(500, { "Content-Type": "text/plain" });
			}
			res.end("Internal Server Error");
		}
	}
}

/**
 * Decides the redirect for a request that consumed every segment without reaching a handler.
 *
 * - `/foo/` redirects to `/foo` when the node one level up carries a handler.
 * - `/foo` redirects to `/foo/` when the reached node has a trailing-slash child with a handler.
 */
function trailingSlashRedirect(path: string, node: RouteNode | undefined, previous: RouteNode | undefined): RouteMatch {
	if (path.endsWith("/")) {
		if (previous?.handler) {
			return { type: "redirect", location: path.slice(0, -1) };
		}
	} else if (node?.children.get("")?.handler) {
		return { type: "redirect", location: `${path}/` };
	}
	return NOT_FOUND;
}

export { InvalidPathError, RouteConflictError, RouteLockError, RouterError } from "./errors";
export { RouteNode, RouteTree, splitPath } from "./tree";
export type * from "./types";
