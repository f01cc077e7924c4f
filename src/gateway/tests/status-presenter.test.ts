import { describe, expect, test, vi } from "vitest";
import type { ToolInvocation } from "@/gateway/schemas/stream-event";
import { StatusPresenter } from "@/gateway/services/status-presenter";

const tool = (summary: string): ToolInvocation => ({ name: "Read", input: {}, summary });

function createPresenter(maxChars = 4000) {
	let now = 0;
	const edit = vi.fn(async (_text: string) => {});
	const presenter = new StatusPresenter({ minIntervalMs: 3000, maxChars, edit, now: () => now });
	return {
		presenter,
		edit,
		advance: (ms: number) => {
			now += ms;
		},
	};
}

describe("StatusPresenter", () => {
	test("shows the initial text before any tool runs", () => {
		const { presenter } = createPresenter();
		expect(presenter.render()).toBe("Working...");
	});

	test("ten tool events within a second produce a single edit", async () => {
		const { presenter, edit, advance } = createPresenter();
		for (let i = 0; i < 10; i++) {
			await presenter.record([tool(`step ${i}`)]);
			advance(100);
		}
		expect(edit).toHaveBeenCalledTimes(1);
		expect(edit).toHaveBeenCalledWith("step 0");
		expect(presenter.hasPending).toBe(true);
		expect(presenter.toolCount).toBe(10);
	});

	test("coalesced updates go out once the interval has passed", async () => {
		const { presenter, edit, advance } = createPresenter();
		await presenter.record([tool("first")]);
		advance(1000);
		await presenter.record([tool("second"), tool("third")]);
		await presenter.tick();
		expect(edit).toHaveBeenCalledTimes(1);

		advance(2000);
		await presenter.tick();
		expect(edit).toHaveBeenCalledTimes(2);
		expect(edit).toHaveBeenLastCalledWith("first\nsecond\nthird");
		expect(presenter.hasPending).toBe(false);
		expect(presenter.edits).toBe(2);
	});

	test("tick without new activity does not edit", async () => {
		const { presenter, edit, advance } = createPresenter();
		advance(10000);
		await presenter.tick();
		expect(edit).not.toHaveBeenCalled();
	});

	test("keeps the tail of a long log", async () => {
		const { presenter } = createPresenter(10);
		await presenter.record([tool("aaaaaa"), tool("bbbbbb")]);
		expect(presenter.render()).toBe("aaa\nbbbbbb");
	});

	test("a failed edit does not throw", async () => {
		const edit = vi.fn(async () => {
			throw new Error("message is not modified");
		});
		const presenter = new StatusPresenter({ minIntervalMs: 3000, maxChars: 4000, edit, now: () => 0 });
		await expect(presenter.record([tool("x")])).resolves.toBeUndefined();
		expect(edit).toHaveBeenCalledTimes(1);
	});
});
