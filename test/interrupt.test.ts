import { describe, expect, it, vi } from "vitest";
import { onInterrupt, runInterruptCleanups } from "../src/interrupt.js";

describe("interrupt cleanups", () => {
  it("runs registered cleanups once and skips disposed ones", async () => {
    const kept = vi.fn(async () => undefined);
    const disposed = vi.fn();
    onInterrupt(kept);
    const dispose = onInterrupt(disposed);
    dispose();

    await runInterruptCleanups();
    await runInterruptCleanups();

    expect(kept).toHaveBeenCalledTimes(1);
    expect(disposed).not.toHaveBeenCalled();
  });

  it("keeps going when a cleanup throws", async () => {
    const after = vi.fn();
    onInterrupt(() => {
      throw new Error("busy");
    });
    onInterrupt(after);

    await runInterruptCleanups();

    expect(after).toHaveBeenCalledTimes(1);
  });
});
