import { createServer } from "node:http";
import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
import { Router } from "../packages/core/src";
import { logger } from "../packages/middleware/src/logger";

const log = new Logger({ level: Levels.DEBUG, transports: [new ConsoleTransport()] });
const logged = logger({ logger: log, preset: "standard" });

const router = new Router({ logger: log });

router.get("/", logged((ctx) => ctx.text("Hello World")));
router.get("/users/:id", logged((ctx) => ctx.json({ id: ctx.params.id })));
router.get("/users/:id/posts/", logged((ctx) => ctx.json({ user: ctx.params.id, posts: [] })));
router.post("/users", logged(async (ctx) => ctx.json(await ctx.req.json(), 201)));

router.onNotFound((ctx) => ctx.json({ error: "Not Found", path: new URL(ctx.req.url).pathname }, 404));

router.printRoutes((line) => log.info(line));

createServer(router.handleNode).listen(3000, () => {
	log.info("Server running at http://localhost:3000");
});
