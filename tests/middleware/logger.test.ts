import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger, Levels } from "../../packages/middleware/src/logger";
import { Router, type Handler } from "../../packages/core/src";

class MockLogger {
	public logs: Array<{ level: number; message: string; metadata?: unknown }> = [];

	log(level: number, message: string, metadata?: unknown): void {
		this.logs.push({ level, message, metadata });
	}
}

function mockRequest(path: string, headers: Record<string, string> = {}) {
	return new Request(`http://localhost${path}`, { headers });
}

const showUser: Handler = (ctx) => ctx.text(`User ${ctx.params.id}`);

describe("Logger Middleware", () => {
	let mockLogger: MockLogger;

	beforeEach(() => {
		mockLogger = new MockLogger();
	});

	describe("Basic Functionality", () => {
		it("should log request and response with default settings", async () => {
			const router = new Router();
			router.get("/users/:id", logger({ logger: mockLogger })(showUser));

			const res = await router.handle(mockRequest("/users/42?tab=posts"));
			expect(await res.text()).toBe("User 42");

			expect(mockLogger.logs).toHaveLength(2);

			const [requestLog, responseLog] = mockLogger.logs;
			expect(requestLog?.level).toBe(Levels.HTTP);
			expect(requestLog?.message).toBe("GET /users/42?tab=posts");
			expect(requestLog?.metadata).toEqual({});

			expect(responseLog?.level).toBe(Levels.HTTP);
			expect(responseLog?.message).toMatch(/^GET \/users\/42\?tab=posts - 200 - \d+ms$/);
			expect(responseLog?.metadata).toEqual({ duration: expect.any(Number), response: { statusCode: 200 } });
		});

		it("should log at the configured level", async () => {
			const router = new Router();
			router.get("/users/:id", logger({ logger: mockLogger, level: Levels.INFO })(showUser));

			await router.handle(mockRequest("/users/1"));
			expect(mockLogger.logs.map((log) => log.level)).toEqual([Levels.INFO, Levels.INFO]);
		});

		it("should use the request ID header with the standard preset", async () => {
			const router = new Router();
			router.get("/users/:id", logger({ logger: mockLogger, preset: "standard" })(showUser));

			await router.handle(mockRequest("/users/1", { "x-request-id": "test-request-id" }));
			expect(mockLogger.logs[0]?.metadata).toEqual({ requestId: "test-request-id" });
			expect(mockLogger.logs[1]?.metadata).toMatchObject({ requestId: "test-request-id" });
		});

		it("should generate a request ID when none is sent", async () => {
			const router = new Router();
			router.get("/users/:id", logger({ logger: mockLogger, includeRequestId: true })(showUser));

			await router.handle(mockRequest("/users/1"));
			expect(mockLogger.logs[0]?.metadata).toEqual({ requestId: expect.stringMatching(/^[0-9a-f-]{36}$/) });
		});

		it("should omit the duration when disabled", async () => {
			const router = new Router();
			router.get("/users/:id", logger({ logger: mockLogger, logDuration: false })(showUser));

			await router.handle(mockRequest("/users/1"));
			expect(mockLogger.logs[1]?.metadata).toEqual({ response: { statusCode: 200 } });
		});
	});

	describe("Request Logging", () => {
		it("should log headers, user agent and parameters with the detailed preset", async () => {
			const router = new Router();
			router.get("/users/:id", logger({ logger: mockLogger, preset: "detailed", generateRequestId: () => "fixed-id" })(showUser));

			await router.handle(
				mockRequest("/users/42", {
					authorization: "Bearer test-secret",
					"user-agent": "test-agent",
					"x-custom": "value",
				})
			);

			expect(mockLogger.logs[0]?.metadata).toEqual({
				requestId: "fixed-id",
				request: {
					method: "GET",
					pathname: "/users/42",
					search: "",
					headers: { "user-agent": "test-agent", "x-custom": "value" },
					userAgent: "test-agent",
					params: { id: "42" },
				},
			});
		});

		it("should keep preset values for options left undefined", async () => {
			const router = new Router();
			router.get(
				"/users/:id",
				logger({ logger: mockLogger, preset: "detailed", includeParams: undefined, includeHeaders: false, generateRequestId: () => "fixed-id" })(
					showUser
				)
			);

			await router.handle(mockRequest("/users/5", { "user-agent": "test-agent" }));

			expect(mockLogger.logs[0]?.metadata).toEqual({
				requestId: "fixed-id",
				request: {
					method: "GET",
					pathname: "/users/5",
					search: "",
					userAgent: "test-agent",
					params: { id: "5" },
				},
			});
		});

		it("should include static metadata and metadata built from the context", async () => {
			const router = new Router();
			router.get("/a", logger({ logger: mockLogger, metadata: { service: "api" } })((ctx) => ctx.text("a")));
			router.get("/b/:id", logger({ logger: mockLogger, metadata: (ctx) => ({ id: ctx.params.id }) })((ctx) => ctx.text("b")));

			await router.handle(mockRequest("/a"));
			await router.handle(mockRequest("/b/9"));

			expect(mockLogger.logs[0]?.metadata).toEqual({ service: "api" });
			expect(mockLogger.logs[2]?.metadata).toEqual({ id: "9" });
		});

		it("should skip request logs when disabled", async () => {
			const router = new Router();
			router.get("/users/:id", logger({ logger: mockLogger, logRequests: false })(showUser));

			await router.handle(mockRequest("/users/1"));
			expect(mockLogger.logs).toHaveLength(1);
			expect(mockLogger.logs[0]?.message).toMatch(/ - 200 - /);
		});

		it("should use custom message formatters", async () => {
			const router = new Router();
			router.get(
				"/users/:id",
				logger({
					logger: mockLogger,
					formatRequestMessage: (ctx) => `in ${ctx.params.id}`,
					formatResponseMessage: (ctx, _duration, status) => `out ${ctx.params.id} ${status}`,
				})(showUser)
			);

			await router.handle(mockRequest("/users/3"));
			expect(mockLogger.logs.map((log) => log.message)).toEqual(["in 3", "out 3 200"]);
		});
	});

	describe("Exclusions", () => {
		it("should not log default excluded paths", async () => {
			const router = new Router();
			router.get("/health", logger({ logger: mockLogger })((ctx) => ctx.text("ok")));

			const res = await router.handle(mockRequest("/health"));
			expect(await res.text()).toBe("ok");
			expect(mockLogger.logs).toHaveLength(0);
		});

		it("should not log paths matching a regex", async () => {
			const router = new Router();
			router.get("/static/:file", logger({ logger: mockLogger, excludePaths: [/^\/static\//] })((ctx) => ctx.text("file")));

			await router.handle(mockRequest("/static/app.js"));
			expect(mockLogger.logs).toHaveLength(0);
		});

		it("should not log responses with excluded status codes", async () => {
			const router = new Router();
			router.get("/gone", logger({ logger: mockLogger, excludeStatusCodes: [410] })((ctx) => ctx.text("gone", 410)));

			const res = await router.handle(mockRequest("/gone"));
			expect(res.status).toBe(410);
			expect(mockLogger.logs).toHaveLength(1);
			expect(mockLogger.logs[0]?.message).toBe("GET /gone");
		});

		it("should call the handler without logging when skip returns true", async () => {
			const handler = vi.fn<Parameters<Handler>, Response>((ctx) => ctx.text("skipped"));
			const router = new Router();
			router.get("/skip", logger({ logger: mockLogger, skip: () => true })(handler));

			const res = await router.handle(mockRequest("/skip"));
			expect(await res.text()).toBe("skipped");
			expect(handler).toHaveBeenCalledTimes(1);
			expect(mockLogger.logs).toHaveLength(0);
		});
	});

	describe("Error Handling", () => {
		it("should log handler errors and rethrow them", async () => {
			const router = new Router();
			router.get(
				"/boom",
				logger({ logger: mockLogger })(() => {
					throw new Error("kaboom");
				})
			);

			const res = await router.handle(mockRequest("/boom"));
			expect(res.status).toBe(500);

			expect(mockLogger.logs).toHaveLength(2);
			const errorLog = mockLogger.logs[1];
			expect(errorLog?.level).toBe(Levels.ERROR);
			expect(errorLog?.message).toMatch(/^GET \/boom - 500 - \d+ms$/);
			expect(errorLog?.metadata).toMatchObject({
				response: { statusCode: 500 },
				error: { name: "Error", message: "kaboom" },
			});
		});
	});
});
