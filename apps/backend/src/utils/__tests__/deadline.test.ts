import { describe, expect, it } from "vitest";
import { setTimeout as sleep } from "node:timers/promises";
import { DeadlineExceededError, runWithDeadline } from "../deadline";

describe("runWithDeadline", () => {
  it("resolves with the task's value when it finishes in time", async () => {
    await expect(runWithDeadline(1000, async () => "done")).resolves.toBe("done");
  });

  it("propagates task errors", async () => {
    await expect(runWithDeadline(1000, async () => Promise.reject(new Error("bad input")))).rejects.toThrow(
      "bad input",
    );
  });

  it("rejects and aborts the task's signal on expiry", async () => {
    let seen: AbortSignal | undefined;
    const error = await runWithDeadline(20, async (signal) => {
      seen = signal;
      await sleep(200);
      return "late";
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toMatchObject({ timeoutMs: 20, message: "Deadline of 20ms exceeded" });
    expect(seen?.aborted).toBe(true);
  });
});
