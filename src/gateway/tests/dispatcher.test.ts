import { describe, expect, test, vi } from "vitest";
import type { Bot, Message } from "@/gateway/pipeline";
import { MessageDispatcher } from "@/gateway/pipeline/dispatcher";
import { FakeChannel, OWNER_ID, ownerMessage } from "./fakes";

function createBots(agentHandle: (message: Message) => Promise<boolean> = async () => true) {
	const menu: Bot = {
		name: "MenuBot",
		handle: vi.fn(async () => true),
		getMenus: () => [{ command: "status", description: "Show session info" }],
	};
	const agent: Bot = { name: "AgentBot", handle: vi.fn(agentHandle), getMenus: () => [] };
	return { menu, agent };
}

describe("MessageDispatcher", () => {
	test("drops messages from anyone but the owner without replying", async () => {
		const channel = new FakeChannel();
		const { menu, agent } = createBots();
		const dispatcher = new MessageDispatcher(channel, [menu, agent], OWNER_ID);

		await dispatcher.dispatch(ownerMessage("let me in", { user: { id: 999, username: "stranger" } }));
		await dispatcher.dispatch(ownerMessage("/status", { user: { id: 999 } }));

		expect(agent.handle).not.toHaveBeenCalled();
		expect(menu.handle).not.toHaveBeenCalled();
		expect(channel.sent).toEqual([]);
	});

	test("routes owner messages to the matching bot", async () => {
		const channel = new FakeChannel();
		const { menu, agent } = createBots();
		const dispatcher = new MessageDispatcher(channel, [menu, agent], OWNER_ID);

		await dispatcher.dispatch(ownerMessage("/status", { updateId: 1 }));
		await dispatcher.dispatch(ownerMessage("hello", { updateId: 2 }));
		await dispatcher.dispatch(ownerMessage("/nope", { updateId: 3 }));

		expect(menu.handle).toHaveBeenCalledTimes(1);
		expect(agent.handle).toHaveBeenCalledTimes(1);
	});

	test("ignores a redelivered update", async () => {
		const channel = new FakeChannel();
		const { menu, agent } = createBots();
		const dispatcher = new MessageDispatcher(channel, [menu, agent], OWNER_ID);

		await dispatcher.dispatch(ownerMessage("hello", { updateId: 77 }));
		await dispatcher.dispatch(ownerMessage("hello", { updateId: 77 }));

		expect(agent.handle).toHaveBeenCalledTimes(1);
	});

	test("replies with a generic error when a bot throws", async () => {
		const channel = new FakeChannel();
		const { menu, agent } = createBots(async () => {
			throw new TypeError("cannot read properties of undefined");
		});
		const dispatcher = new MessageDispatcher(channel, [menu, agent], OWNER_ID);

		await dispatcher.dispatch(ownerMessage("hello"));

		expect(channel.sent.map((m) => m.text)).toEqual(["Error: TypeError: check logs for details."]);
	});
});
