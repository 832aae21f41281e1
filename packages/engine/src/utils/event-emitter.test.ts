import { describe, expect, it } from "vitest";
import { EventEmitter } from "./event-emitter.js";

type TestEvents = {
  tick: [count: number];
  done: [];
};

describe("EventEmitter", () => {
  it("delivers arguments to every listener", () => {
    const emitter = new EventEmitter<TestEvents>();
    const seen: number[] = [];
    emitter.on("tick", (n) => seen.push(n));
    emitter.on("tick", (n) => seen.push(n * 10));

    expect(emitter.emit("tick", 2)).toBe(true);
    expect(seen).toEqual([2, 20]);
  });

  it("returns false when nobody listens", () => {
    expect(new EventEmitter<TestEvents>().emit("done")).toBe(false);
  });

  it("runs once listeners a single time", () => {
    const emitter = new EventEmitter<TestEvents>();
    let calls = 0;
    emitter.once("done", () => calls++);

    emitter.emit("done");
    emitter.emit("done");

    expect(calls).toBe(1);
    expect(emitter.listenerCount("done")).toBe(0);
  });

  it("removes listeners with off and removeAllListeners", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = () => {};
    emitter.on("tick", listener).on("done", listener);

    emitter.off("tick", listener);
    expect(emitter.listenerCount("tick")).toBe(0);

    emitter.removeAllListeners();
    expect(emitter.listenerCount("done")).toBe(0);
  });
});
