import { Hono } from "hono";
import { pinoLogger } from "hono-pino";
import { handleHealth, type HealthContext } from "@/gateway/routes/health";
import { createWebhookRoutes, type WebhookContext } from "@/gateway/routes/webhook";
import { logger } from "@/packages/logger";

export type AppContext = WebhookContext & HealthContext;

export function createApp(ctx: AppContext): Hono {
	const app = new Hono();

	// Format: [GET] /path → 200 (123ms)
	app.use("*", async (c, next) => {
		const start = Date.now();
		await next();
		logger.info(`[${c.req.method}] ${c.req.path} → ${c.res.status} (${Date.now() - start}ms)`);
	});

	app.use("*", pinoLogger({ pino: logger }));

	app.get("/health", (c) => handleHealth(c, ctx));
	app.route("/webhook", createWebhookRoutes(ctx));

	return app;
}
