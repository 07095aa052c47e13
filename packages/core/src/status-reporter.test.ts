import { describe, it, expect } from "vitest";
import { createLogger } from "@kbconnect/logger";
import type { StatusEvent } from "@kbconnect/types";
import { StatusReporter } from "./status-reporter.js";

const logger = createLogger({ silent: true });

function clock(...times: number[]): () => number {
  let i = 0;
  return () => times[Math.min(i++, times.length - 1)] ?? 0;
}

describe("StatusReporter", () => {
  it("drops events inside the interval but always delivers done", async () => {
    const events: StatusEvent[] = [];
    const reporter = new StatusReporter(
      (event) => {
        events.push(event);
      },
      { enabled: true, emitIntervalMs: 2000 },
      logger,
      clock(0, 500, 2500, 2600),
    );

    await reporter.emit("info", "first");
    await reporter.emit("info", "too soon");
    await reporter.emit("info", "later");
    await reporter.emit("info", "Complete", true);

    expect(events).toEqual([
      { level: "info", message: "first", done: false },
      { level: "info", message: "later", done: false },
      { level: "info", message: "Complete", done: true },
    ]);
  });

  it("emits nothing when disabled", async () => {
    const events: StatusEvent[] = [];
    const reporter = new StatusReporter(
      (event) => {
        events.push(event);
      },
      { enabled: false, emitIntervalMs: 0 },
      logger,
    );

    await reporter.emit("info", "Complete", true);

    expect(events).toEqual([]);
  });

  it("is a no-op without a sink", async () => {
    const reporter = new StatusReporter(undefined, { enabled: true, emitIntervalMs: 0 }, logger);

    await expect(reporter.emit("info", "hello")).resolves.toBeUndefined();
  });

  it("keeps going when the sink throws", async () => {
    const reporter = new StatusReporter(
      () => {
        throw new Error("socket closed");
      },
      { enabled: true, emitIntervalMs: 0 },
      logger,
    );

    await expect(reporter.emit("error", "oops", true)).resolves.toBeUndefined();
  });
});
