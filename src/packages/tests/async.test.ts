import { describe, expect, test } from "vitest";
import { AsyncQueue, delay, KeyedSerializer } from "@/packages/async";

describe("AsyncQueue", () => {
	test("delivers items in push order", async () => {
		const queue = new AsyncQueue<number>();
		queue.push(1);
		queue.push(2);
		expect(await queue.next()).toEqual({ kind: "item", value: 1 });
		expect(await queue.next()).toEqual({ kind: "item", value: 2 });
	});

	test("wakes a waiting consumer on push", async () => {
		const queue = new AsyncQueue<string>();
		const pending = queue.next();
		queue.push("late");
		expect(await pending).toEqual({ kind: "item", value: "late" });
	});

	test("reports a timeout when nothing arrives", async () => {
		const queue = new AsyncQueue<string>();
		expect(await queue.next(5)).toEqual({ kind: "timeout" });
	});

	test("drains queued items before reporting closed", async () => {
		const queue = new AsyncQueue<number>();
		queue.push(7);
		queue.close();
		queue.push(8);
		expect(queue.isClosed).toBe(true);
		expect(queue.size).toBe(1);
		expect(await queue.next()).toEqual({ kind: "item", value: 7 });
		expect(await queue.next()).toEqual({ kind: "closed" });
	});

	test("close wakes a waiting consumer", async () => {
		const queue = new AsyncQueue<number>();
		const pending = queue.next(1000);
		queue.close();
		expect(await pending).toEqual({ kind: "closed" });
	});

	test("iterates until closed", async () => {
		const queue = new AsyncQueue<number>();
		queue.push(1);
		queue.push(2);
		queue.close();
		const seen: number[] = [];
		for await (const item of queue) seen.push(item);
		expect(seen).toEqual([1, 2]);
	});
});

describe("KeyedSerializer", () => {
	test("runs tasks for the same key one at a time", async () => {
		const serializer = new KeyedSerializer();
		const order: string[] = [];

		const first = serializer.run(1, async () => {
			order.push("first:start");
			await delay(10);
			order.push("first:end");
		});
		const second = serializer.run(1, async () => {
			order.push("second:start");
		});

		expect(serializer.isBusy(1)).toBe(true);
		await Promise.all([first, second]);
		expect(order).toEqual(["first:start", "first:end", "second:start"]);
	});

	test("a failed task does not block the next one", async () => {
		const serializer = new KeyedSerializer();
		const failed = serializer.run("chat", async () => {
			throw new Error("boom");
		});
		await expect(failed).rejects.toThrow("boom");
		await expect(serializer.run("chat", async () => "ok")).resolves.toBe("ok");
	});

	test("different keys run concurrently", async () => {
		const serializer = new KeyedSerializer();
		const order: string[] = [];
		await Promise.all([
			serializer.run("a", async () => {
				await delay(10);
				order.push("a");
			}),
			serializer.run("b", async () => {
				order.push("b");
			}),
		]);
		expect(order).toEqual(["b", "a"]);
	});

	test("is idle once the chain settles", async () => {
		const serializer = new KeyedSerializer();
		await serializer.run(5, async () => undefined);
		await delay(0);
		expect(serializer.isBusy(5)).toBe(false);
	});
});
