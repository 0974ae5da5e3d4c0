import type { Logger } from "@rabbit-company/logger";

/**
 * Route handler invoked once a request matches a registered path.
 *
 * @param ctx - Context object containing the request, its captured path parameters and response helpers
 * @returns Response object or Promise resolving to one
 *
 * @example
 * ```typescript
 * const getUser: Handler = async (ctx) => {
 *   const user = await findUser(ctx.params.id);
 *   return user ? ctx.json(user) : ctx.text("Unknown user", 404);
 * };
 * ```
 */
export type Handler = (ctx: Context) => Response | Promise<Response>;

/**
 * Handler called with the error thrown by a route handler.
 */
export type ErrorHandler = (err: Error, ctx: Context) => Response | Promise<Response>;

/**
 * HTTP methods that routes can be registered for.
 *
 * @example
 * ```typescript
 * const method: Method = "GET";
 * router.addRoute(method, "/users", handler);
 * ```
 */
export type Method = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS" | "TRACE";

/**
 * Path parameters captured while walking the route tree, keyed by parameter name.
 */
export type Params = Record<string, string>;

/**
 * Outcome of matching a method and path against the registered routes.
 *
 * @example
 * ```typescript
 * const result = router.match("GET", "/users/42");
 * if (result.type === "found") {
 *   console.log(result.params.id); // "42"
 * } else if (result.type === "redirect") {
 *   console.log(result.location); // e.g. "/users/42/"
 * }
 * ```
 */
export type RouteMatch =
	| { type: "found"; handler: Handler; params: Params }
	| { type: "redirect"; location: string }
	| { type: "not-found" };

/**
 * Logger accepted by the router. Any `@rabbit-company/logger` instance fits.
 */
export type RouterLogger = Pick<Logger, "log">;

/**
 * Options for configuring a {@link Router}.
 */
export interface RouterOptions {
	/**
	 * Redirect a request that only misses or adds a trailing slash compared to a registered route.
	 * With `/foo` defined, `/foo/` redirects to `/foo`; with `/foo/` defined, `/foo` redirects to `/foo/`.
	 * When both are defined no redirect happens.
	 * Default: true
	 */
	redirectTrailingSlash?: boolean;

	/**
	 * Take the route lock on every registration and lookup.
	 * Set to false only when every route is registered before the router starts serving.
	 * Default: true
	 */
	concurrentAdd?: boolean;

	/**
	 * Logger for registration and dispatch events. Nothing is logged when omitted.
	 */
	logger?: RouterLogger;
}

/**
 * Context object passed to route handlers. A new context, with its own `params`, is created for every request.
 *
 * @example
 * ```typescript
 * router.get("/files/:name", (ctx) => {
 *   ctx.header("Cache-Control", "no-store");
 *   return ctx.text(`You asked for ${ctx.params.name}`);
 * });
 * ```
 */
export interface Context {
	/** The original Request object */
	req: Request;
	/** Request method the route was matched by; differs from `req.method` for TRACE requests served by `handleNode` */
	method: string;
	/** Path parameters captured for this request */
	params: Readonly<Params>;
	/**
	 * Sets a response header on the response built by `text`, `json`, `html` or `redirect`.
	 *
	 * @example
	 * ```typescript
	 * ctx.header("X-Custom-Header", "value");
	 * ```
	 */
	header: (name: string, value: string) => void;
	/**
	 * Returns a plain text response.
	 *
	 * @param body - Text content for the response body
	 * @param status - HTTP status code (default: 200)
	 * @param headers - Additional headers to include
	 *
	 * @example
	 * ```typescript
	 * return ctx.text("Hello World");
	 * return ctx.text("Created", 201, { "X-Custom": "value" });
	 * ```
	 */
	text: (body: string | null | undefined, status?: number, headers?: Record<string, string>) => Response;
	/**
	 * Returns a JSON response with the `application/json` content type.
	 *
	 * @param data - Data to be serialized as JSON
	 * @param status - HTTP status code (default: 200)
	 * @param headers - Additional headers to include
	 */
	json: (data: unknown, status?: number, headers?: Record<string, string>) => Response;
	/**
	 * Returns an HTML response.
	 */
	html: (html: string | null | undefined, status?: number, headers?: Record<string, string>) => Response;
	/**
	 * Returns a redirect response.
	 *
	 * @param url - Value of the Location header
	 * @param status - HTTP status code for redirect (default: 302)
	 *
	 * @example
	 * ```typescript
	 * return ctx.redirect("/login");
	 * return ctx.redirect("/new-home", 301);
	 * ```
	 */
	redirect: (url: string, status?: number) => Response;
}

/**
 * A registered route as reported by `getRoutes()`.
 */
export interface RouteInfo {
	method: Method;
	path: string;
}
