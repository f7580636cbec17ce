import { describe, it, expect } from "vitest";
import { withTimeout } from "./timeout.js";
import { TimeoutError } from "./errors.js";

describe("withTimeout", () => {
  it("resolves when the promise completes first", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  it("rejects with TimeoutError when the timer fires first", async () => {
    const slow = new Promise<void>((resolve) => setTimeout(resolve, 5000).unref());
    await expect(withTimeout(slow, 20, "dfrotz read")).rejects.toThrow(TimeoutError);
    await expect(withTimeout(slow, 20, "dfrotz read")).rejects.toThrow("dfrotz read timed out after 20ms");
  });

  it("passes a rejection through", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 1000)).rejects.toThrow("boom");
  });

  it("returns the original promise when ms <= 0", () => {
    const p = Promise.resolve("x");
    expect(withTimeout(p, 0)).toBe(p);
  });
});
