import { describe, expect, test, vi } from "vitest";
import { TelegramPoller } from "@/gateway/channels/poller";
import { TelegramChannel, TelegramClient } from "@/gateway/channels/telegram";
import type { Message } from "@/gateway/pipeline";
import { delay } from "@/packages/async";

const textUpdate = (updateId: number, text: string) => ({
	update_id: updateId,
	message: { message_id: updateId, chat: { id: 4242 }, from: { id: 4242 }, text },
});

function setup(batches: unknown[][]) {
	const client = new TelegramClient("test-token");
	// An empty queue behaves like an idle long poll instead of spinning
	const getUpdates = vi.spyOn(client, "getUpdates").mockImplementation(async () => {
		const batch = batches.shift();
		if (batch) return batch;
		await delay(5);
		return [];
	});
	const deleteWebhook = vi.spyOn(client, "deleteWebhook").mockResolvedValue(undefined);
	const channel = new TelegramChannel("test-token", client);
	const received: Message[] = [];
	const poller = new TelegramPoller(channel, {
		timeoutSeconds: 30,
		onMessage: (message) => received.push(message),
		retryDelayMs: 5,
	});
	return { poller, getUpdates, deleteWebhook, received };
}

describe("TelegramPoller", () => {
	test("dispatches messages and advances the offset", async () => {
		const { poller, getUpdates, received } = setup([[textUpdate(100, "one"), textUpdate(101, "two")], []]);

		expect(await poller.pollOnce()).toBe(2);
		expect(received.map((m) => m.text)).toEqual(["one", "two"]);
		expect(poller.nextOffset).toBe(102);

		await poller.pollOnce();
		expect(getUpdates).toHaveBeenNthCalledWith(1, undefined, 30, undefined);
		expect(getUpdates).toHaveBeenNthCalledWith(2, 102, 30, undefined);
	});

	test("skips updates without a message but still acknowledges them", async () => {
		const { poller, received } = setup([[{ update_id: 7, edited_message: { message_id: 1 } }]]);

		await poller.pollOnce();
		expect(received).toEqual([]);
		expect(poller.nextOffset).toBe(8);
	});

	test("start drops pending updates and stop ends the loop", async () => {
		const { poller, deleteWebhook, received } = setup([[textUpdate(1, "hi")]]);

		await poller.start();
		await vi.waitFor(() => expect(received).toHaveLength(1));
		await poller.stop();

		expect(deleteWebhook).toHaveBeenCalledWith(true);
	});

	test("keeps polling after a failed request", async () => {
		const { poller, getUpdates, received } = setup([]);
		getUpdates.mockRejectedValueOnce(new Error("ETIMEDOUT")).mockResolvedValueOnce([textUpdate(5, "after")]);

		await poller.start();
		await vi.waitFor(() => expect(received.map((m) => m.text)).toEqual(["after"]));
		await poller.stop();
	});
});
