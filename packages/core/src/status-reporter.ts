import type { StatusConfig, StatusLevel, StatusSink } from "@kbconnect/types";
import type { Logger } from "@kbconnect/logger";

/**
 * Forwards progress events to an optional sink. Non-final events arriving
 * within `emitIntervalMs` of the last delivered one are dropped; a final
 * (`done`) event is always delivered.
 */
export class StatusReporter {
  private lastEmittedAt: number | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly sink: StatusSink | undefined,
    private readonly options: StatusConfig,
    logger: Logger,
    private readonly now: () => number = Date.now,
  ) {
    this.logger = logger.child({ component: "status-reporter" });
  }

  async emit(level: StatusLevel, message: string, done = false): Promise<void> {
    if (!this.sink || !this.options.enabled) return;

    const at = this.now();
    if (
      !done &&
      this.lastEmittedAt !== undefined &&
      at - this.lastEmittedAt < this.options.emitIntervalMs
    ) {
      return;
    }

    this.lastEmittedAt = at;
    try {
      await this.sink({ level, message, done });
    } catch (error) {
      this.logger.warn({ err: error, message }, "status sink rejected an event");
    }
  }
}
