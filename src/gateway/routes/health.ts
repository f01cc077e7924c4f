import type { Context } from "hono";
import type { RelayMode } from "@/gateway/consts";
import type { SessionStore } from "@/gateway/session";

const startedAt = Date.now();

export interface HealthContext {
	mode: RelayMode;
	session: SessionStore;
}

export const handleHealth = (c: Context, ctx: HealthContext) => {
	const { state, messageCount, model } = ctx.session.snapshot();
	return c.json({
		status: "ok",
		mode: ctx.mode,
		uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
		session: { state, messageCount, model },
	});
};
