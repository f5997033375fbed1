import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { PlinthLoggerImpl } from "../src/logger";
import { ContextAwareLogger, getRequestId, getRequestLogger, requestStore } from "../src/request-context";
import { LogCapture } from "./fixtures/telemetry";

function loggers() {
  const capture = new LogCapture();
  const root = new PlinthLoggerImpl(pino({ level: "debug" }, capture));
  const scoped = root.child("request", { requestId: "req-1" });
  return { capture, root, scoped };
}

describe("request store", () => {
  it("is empty outside a request", () => {
    expect(getRequestLogger()).toBeUndefined();
    expect(getRequestId()).toBeUndefined();
  });

  it("exposes the request logger and id across awaits", async () => {
    const { scoped } = loggers();

    const seen = await requestStore.run({ requestId: "req-1", logger: scoped }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return [getRequestLogger(), getRequestId()];
    });

    expect(seen).toEqual([scoped, "req-1"]);
  });
});

describe("ContextAwareLogger", () => {
  it("logs through the root logger outside a request", () => {
    const { capture, root } = loggers();

    new ContextAwareLogger(root).info("startup", { step: 1 });

    const [record] = capture.records();
    expect(record).toMatchObject({ msg: "startup", step: 1 });
    expect(record).not.toHaveProperty("requestId");
  });

  it("logs through the request logger inside a request", () => {
    // Arrange
    const { capture, root, scoped } = loggers();
    const logger = new ContextAwareLogger(root);

    // Act
    requestStore.run({ requestId: "req-1", logger: scoped }, () => {
      logger.debug("d");
      logger.warn("w");
      logger.error("e");
    });
    logger.info("after");

    // Assert
    const records = capture.records();
    expect(records.map((r) => [r.msg, r.requestId])).toEqual([
      ["d", "req-1"],
      ["w", "req-1"],
      ["e", "req-1"],
      ["after", undefined],
    ]);
  });

  it("derives children from the current logger", () => {
    const { root, scoped } = loggers();
    const child = vi.spyOn(scoped, "child");
    const withContext = vi.spyOn(root, "withContext");
    const logger = new ContextAwareLogger(root);

    requestStore.run({ requestId: "req-1", logger: scoped }, () => logger.child("repo", { table: "orders" }));
    logger.withContext({ job: "sweep" });

    expect(child).toHaveBeenCalledWith("repo", { table: "orders" });
    expect(withContext).toHaveBeenCalledWith({ job: "sweep" });
  });
});
