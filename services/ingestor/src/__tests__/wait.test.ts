import { describe, expect, test } from "vitest";
import { wait } from "../wait.ts";

describe("wait", () => {
  test("resolves after the delay", async () => {
    const startedAt = Date.now();
    await wait(30);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(25);
  });

  test("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 20);

    await wait(60_000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });

  test("resolves at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const startedAt = Date.now();

    await wait(60_000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });
});
