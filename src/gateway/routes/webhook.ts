import { timingSafeEqual } from "node:crypto";
import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import type { ChannelAdapter } from "@/gateway/channels";
import { RELAY_CONSTANTS } from "@/gateway/consts";
import type { MessageDispatcher } from "@/gateway/pipeline/dispatcher";
import { TelegramUpdateSchema } from "@/gateway/schemas/telegram-update";
import { logger } from "@/packages/logger";

export interface WebhookContext {
	adapter: ChannelAdapter;
	dispatcher: Pick<MessageDispatcher, "dispatch">;
	/** Expected X-Telegram-Bot-Api-Secret-Token; unchecked when unset */
	secret?: string;
}

function secretMatches(provided: string | undefined, expected: string): boolean {
	if (provided === undefined) return false;
	const a = Buffer.from(provided);
	const b = Buffer.from(expected);
	return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Telegram webhook intake. Acknowledges at once and processes in the background,
 * since Telegram redelivers anything not answered within its own timeout.
 */
export function createWebhookRoutes(ctx: WebhookContext) {
	const app = new Hono();

	app.use("/telegram", async (c, next) => {
		if (ctx.secret && !secretMatches(c.req.header(RELAY_CONSTANTS.TELEGRAM.SECRET_HEADER), ctx.secret)) {
			logger.warn("Webhook request with bad secret token rejected");
			return c.json({ error: "Unauthorized" }, 401);
		}
		await next();
	});

	app.post(
		"/telegram",
		zValidator("json", TelegramUpdateSchema, (result, c) => {
			if (!result.success) {
				logger.debug({ issues: result.error.issues.length }, "Ignored malformed update");
				return c.json({ status: "ignored", reason: "malformed" });
			}
		}),
		(c) => {
			const update = c.req.valid("json");
			const message = ctx.adapter.parseUpdate(update);
			if (!message) {
				return c.json({ status: "ignored", reason: "unsupported" });
			}

			ctx.dispatcher.dispatch(message).catch((err: unknown) => {
				logger.error({ err, updateId: update.update_id }, "Webhook message processing failed");
			});
			return c.json({ status: "ok" });
		},
	);

	return app;
}
