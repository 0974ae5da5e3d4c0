import { randomUUID } from "node:crypto";
import type { Context, Handler } from "pathmux";
import { Logger, Levels, ConsoleTransport } from "@rabbit-company/logger";

/**
 * Options for configuring the logger middleware.
 */
export interface LoggerOptions {
	/**
	 * Logger instance to use. If not provided, a default console logger will be created.
	 */
	logger?: Pick<Logger, "log">;

	/**
	 * Log level for HTTP requests.
	 * Default: Levels.HTTP
	 */
	level?: number;

	/**
	 * Preset configuration for common use cases.
	 * Individual options passed alongside override the preset.
	 * - "minimal": Just method, path, status, and duration
	 * - "standard": Adds request ID
	 * - "detailed": Adds headers, user agent and captured path parameters
	 */
	preset?: "minimal" | "standard" | "detailed";

	/**
	 * Whether to log incoming requests.
	 * Default: true
	 */
	logRequests?: boolean;

	/**
	 * Whether to log responses.
	 * Default: true
	 */
	logResponses?: boolean;

	/**
	 * Whether to include the handler duration in response logs.
	 * Default: true
	 */
	logDuration?: boolean;

	/**
	 * Whether to include a request ID in logs.
	 * Default: false
	 */
	includeRequestId?: boolean;

	/**
	 * Whether to include request headers.
	 * Default: false
	 */
	includeHeaders?: boolean;

	/**
	 * Whether to include the user agent.
	 * Default: false
	 */
	includeUserAgent?: boolean;

	/**
	 * Whether to include the path parameters captured by the router.
	 * Default: false
	 */
	includeParams?: boolean;

	/**
	 * Headers to exclude from logging (case-insensitive).
	 * Default: ["authorization", "cookie", "set-cookie"]
	 */
	excludeHeaders?: string[];

	/**
	 * Paths to exclude from logging (exact match or regex).
	 * Default: ["/health", "/ping"]
	 */
	excludePaths?: (string | RegExp)[];

	/**
	 * HTTP status codes whose responses are not logged.
	 * Default: []
	 */
	excludeStatusCodes?: number[];

	/**
	 * Function to generate the request ID. Defaults to the `x-request-id` or `x-correlation-id`
	 * header, or a random UUID.
	 */
	generateRequestId?: (ctx: Context) => string;

	/**
	 * Function to determine if a request should be skipped.
	 */
	skip?: (ctx: Context) => boolean;

	/**
	 * Custom message formatter for request logs.
	 */
	formatRequestMessage?: (ctx: Context) => string;

	/**
	 * Custom message formatter for response logs.
	 */
	formatResponseMessage?: (ctx: Context, duration: number, statusCode: number) => string;

	/**
	 * Additional metadata to include in all logs.
	 */
	metadata?: Record<string, unknown> | ((ctx: Context) => Record<string, unknown>);
}

/**
 * Wraps a route handler so every request it serves is logged.
 */
export type HandlerWrapper = (handler: Handler) => Handler;

/**
 * HTTP request/response logging for route handlers using @rabbit-company/logger.
 *
 * @example
 * ```typescript
 * const logged = logger({ preset: "minimal" });
 *
 * router.get("/users/:id", logged(getUser));
 * // Output: GET /users/42
 * //         GET /users/42 - 200 - 3ms
 *
 * // Custom logger with a specific level
 * const customLogger = new Logger({
 *   level: Levels.INFO,
 *   transports: [new ConsoleTransport()]
 * });
 *
 * const audited = logger({
 *   logger: customLogger,
 *   level: Levels.INFO,
 *   includeParams: true,
 *   excludePaths: ["/health", /^\/static/]
 * });
 * ```
 */
export function logger(options: LoggerOptions = {}): HandlerWrapper {
	const preset = getPresetConfiguration(options.preset);

	const {
		logger: providedLogger,
		level = Levels.HTTP,
		logRequests = true,
		logResponses = true,
		logDuration = true,
		includeRequestId = preset.includeRequestId,
		includeHeaders = preset.includeHeaders,
		includeUserAgent = preset.includeUserAgent,
		includeParams = preset.includeParams,
		excludeHeaders = ["authorization", "cookie", "set-cookie"],
		excludePaths = ["/health", "/ping"],
		excludeStatusCodes = [],
		generateRequestId = defaultRequestIdGenerator,
		skip,
		formatRequestMessage = defaultRequestFormatter,
		formatResponseMessage = defaultResponseFormatter,
		metadata,
	}: LoggerOptions = options;

	// Create default logger if none provided
	const loggerInstance =
		providedLogger ||
		new Logger({
			level,
			transports: [new ConsoleTransport()],
		});

	const normalizedExcludeHeaders = excludeHeaders.map((h) => h.toLowerCase());

	return (handler) => async (ctx) => {
		if (skip && skip(ctx)) {
			return handler(ctx);
		}

		const { pathname } = new URL(ctx.req.url);
		const shouldExcludePath = excludePaths.some((path) => (typeof path === "string" ? pathname === path : path.test(pathname)));
		if (shouldExcludePath) {
			return handler(ctx);
		}

		const baseMetadata: Record<string, unknown> = {
			...getMetadata(metadata, ctx),
			...(includeRequestId ? { requestId: generateRequestId(ctx) } : {}),
		};

		if (logRequests) {
			const requestMetadata = buildRequestMetadata(ctx, baseMetadata, {
				includeHeaders,
				includeUserAgent,
				includeParams,
				normalizedExcludeHeaders,
			});
			loggerInstance.log(level, formatRequestMessage(ctx), requestMetadata);
		}

		const startTime = Date.now();

		try {
			const response = await handler(ctx);
			const duration = Date.now() - startTime;

			if (logResponses && !excludeStatusCodes.includes(response.status)) {
				loggerInstance.log(level, formatResponseMessage(ctx, duration, response.status), {
					...baseMetadata,
					...(logDuration ? { duration } : {}),
					response: { statusCode: response.status },
				});
			}

			return response;
		} catch (error) {
			const duration = Date.now() - startTime;

			if (logResponses) {
				loggerInstance.log(Levels.ERROR, formatResponseMessage(ctx, duration, 500), {
					...baseMetadata,
					...(logDuration ? { duration } : {}),
					response: { statusCode: 500 },
					error: {
						name: error instanceof Error ? error.name : "Unknown",
						message: error instanceof Error ? error.message : String(error),
						stack: error instanceof Error ? error.stack : undefined,
					},
				});
			}

			throw error;
		}
	};
}

type PresetConfiguration = Required<Pick<LoggerOptions, "includeRequestId" | "includeHeaders" | "includeUserAgent" | "includeParams">>;

/**
 * Get preset configuration for common logging scenarios.
 * Options the caller sets, and does not leave undefined, override these.
 */
function getPresetConfiguration(preset?: LoggerOptions["preset"]): PresetConfiguration {
	switch (preset) {
		case "standard":
			return {
				includeRequestId: true,
				includeHeaders: false,
				includeUserAgent: false,
				includeParams: false,
			};

		case "detailed":
			return {
				includeRequestId: true,
				includeHeaders: true,
				includeUserAgent: true,
				includeParams: true,
			};

		case "minimal":
		default:
			return {
				includeRequestId: false,
				includeHeaders: false,
				includeUserAgent: false,
				includeParams: false,
			};
	}
}

function defaultRequestIdGenerator(ctx: Context): string {
	// Try to use existing request ID from headers
	const existingId = ctx.req.headers.get("x-request-id") || ctx.req.headers.get("x-correlation-id");
	if (existingId) {
		return existingId;
	}

	return randomUUID();
}

/**
 * Default request message formatter.
 */
function defaultRequestFormatter(ctx: Context): string {
	const url = new URL(ctx.req.url);
	return `${ctx.method} ${url.pathname}${url.search}`;
}

/**
 * Default response message formatter.
 */
function defaultResponseFormatter(ctx: Context, duration: number, statusCode: number): string {
	const url = new URL(ctx.req.url);
	return `${ctx.method} ${url.pathname}${url.search} - ${statusCode} - ${duration}ms`;
}

/**
 * Build request metadata object.
 */
function buildRequestMetadata(
	ctx: Context,
	baseMetadata: Record<string, unknown>,
	options: {
		includeHeaders: boolean;
		includeUserAgent: boolean;
		includeParams: boolean;
		normalizedExcludeHeaders: string[];
	}
): Record<string, unknown> {
	const metadata: Record<string, unknown> = { ...baseMetadata };

	if (!options.includeHeaders && !options.includeUserAgent && !options.includeParams) {
		return metadata;
	}

	const url = new URL(ctx.req.url);
	const requestData: Record<string, unknown> = {
		method: ctx.method,
		pathname: url.pathname,
		search: url.search,
	};

	if (options.includeHeaders) {
		const headers: Record<string, string> = {};
		ctx.req.headers.forEach((value, key) => {
			if (!options.normalizedExcludeHeaders.includes(key.toLowerCase())) {
				headers[key] = value;
			}
		});
		requestData.headers = headers;
	}

	if (options.includeUserAgent) {
		requestData.userAgent = ctx.req.headers.get("user-agent");
	}

	if (options.includeParams) {
		requestData.params = { ...ctx.params };
	}

	metadata.request = requestData;
	return metadata;
}

/**
 * Get metadata from options.
 */
function getMetadata(metadata: LoggerOptions["metadata"], ctx: Context): Record<string, unknown> {
	if (!metadata) return {};
	if (typeof metadata === "function") return metadata(ctx);
	return metadata;
}

export { Levels } from "@rabbit-company/logger";
