import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type FillEvents = {
	fill: (fill: { tokenId: string; size: number }) => void;
	failed: (reason: string, attempt: number) => void;
	idle: () => void;
};

describe("TypedEmitter", () => {
	it("delivers emitted arguments to on() handlers", () => {
		const emitter = new TypedEmitter<FillEvents>();
		const handler = vi.fn();

		emitter.on("fill", handler);
		const delivered = emitter.emit("fill", { tokenId: "tok-1", size: 10 });

		expect(delivered).toBe(true);
		expect(handler).toHaveBeenCalledWith({ tokenId: "tok-1", size: 10 });
	});

	it("passes multiple arguments in order", () => {
		const emitter = new TypedEmitter<FillEvents>();
		const handler = vi.fn();

		emitter.on("failed", handler);
		emitter.emit("failed", "rejected by venue", 2);

		expect(handler).toHaveBeenCalledWith("rejected by venue", 2);
	});

	it("off() removes a listener", () => {
		const emitter = new TypedEmitter<FillEvents>();
		const handler = vi.fn();

		emitter.on("idle", handler);
		emitter.off("idle", handler);

		expect(emitter.emit("idle")).toBe(false);
		expect(handler).not.toHaveBeenCalled();
	});

	it("once() fires exactly once", () => {
		const emitter = new TypedEmitter<FillEvents>();
		const handler = vi.fn();

		emitter.once("failed", handler);
		emitter.emit("failed", "a", 1);
		emitter.emit("failed", "b", 2);

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith("a", 1);
	});

	it("counts and clears listeners", () => {
		const emitter = new TypedEmitter<FillEvents>();
		emitter.on("idle", () => {});
		emitter.on("idle", () => {});
		emitter.on("fill", () => {});

		expect(emitter.listenerCount("idle")).toBe(2);
		emitter.removeAllListeners("idle");
		expect(emitter.listenerCount("idle")).toBe(0);
		expect(emitter.listenerCount("fill")).toBe(1);

		emitter.removeAllListeners();
		expect(emitter.listenerCount("fill")).toBe(0);
	});

	it("propagates handler exceptions out of emit", () => {
		const emitter = new TypedEmitter<FillEvents>();
		emitter.on("idle", () => {
			throw new Error("listener bug");
		});

		expect(() => emitter.emit("idle")).toThrow("listener bug");
	});
});
