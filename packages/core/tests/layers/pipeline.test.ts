import { describe, it, expect, vi } from "vitest";
import type { HandlerContext, HandlerResponse, PlinthLayer } from "@plinth/types";
import { runLayerPipeline } from "../../src/layers/pipeline";
import { RequestCancelledError } from "../../src/errors/runtime-errors";
import { makeContext } from "../fixtures/context";

const ok: HandlerResponse = { status: 200, body: "ok" };

/** A layer that records entry and exit around `next()`. */
function tracing(name: string, trail: string[]): PlinthLayer {
  return {
    async handle(_context, next) {
      trail.push(`${name}:in`);
      const response = await next();
      trail.push(`${name}:out`);
      return response;
    },
  };
}

describe("runLayerPipeline", () => {
  it("calls the handler directly without layers", async () => {
    const handler = vi.fn(async () => ok);

    const result = await runLayerPipeline([], makeContext(), handler);

    expect(result).toBe(ok);
    expect(handler).toHaveBeenCalledOnce();
  });

  it("runs layers outermost first around the handler", async () => {
    // Arrange
    const trail: string[] = [];
    const handler = async () => {
      trail.push("handler");
      return ok;
    };

    // Act
    await runLayerPipeline([tracing("telemetry", trail), tracing("auth", trail)], makeContext(), handler);

    // Assert
    expect(trail).toEqual(["telemetry:in", "auth:in", "handler", "auth:out", "telemetry:out"]);
  });

  it("hands every layer the same context", async () => {
    const context = makeContext();
    const seen: HandlerContext[] = [];
    const remember: PlinthLayer = {
      handle: (ctx, next) => {
        seen.push(ctx);
        return next();
      },
    };

    await runLayerPipeline([remember, remember], context, async () => ok);

    expect(seen).toEqual([context, context]);
    expect(seen[0]).toBe(context);
  });

  it("lets a layer answer without calling next", async () => {
    const handler = vi.fn(async () => ok);
    const deny: PlinthLayer = { handle: async () => ({ status: 401, body: "no" }) };

    const result = await runLayerPipeline([deny], makeContext(), handler);

    expect(result).toEqual({ status: 401, body: "no" });
    expect(handler).not.toHaveBeenCalled();
  });

  it("lets a layer rewrite the downstream response", async () => {
    const stamp: PlinthLayer = {
      handle: async (_ctx, next) => {
        const response = await next();
        return { ...response, headers: { ...response.headers, "x-request-id": "req-1" } };
      },
    };

    const result = await runLayerPipeline([stamp], makeContext(), async () => ok);

    expect(result).toEqual({ status: 200, body: "ok", headers: { "x-request-id": "req-1" } });
  });

  it("rejects a second next() from the same layer", async () => {
    class Retry implements PlinthLayer {
      async handle(_ctx: HandlerContext, next: () => Promise<HandlerResponse>): Promise<HandlerResponse> {
        await next();
        return next();
      }
    }

    await expect(runLayerPipeline([new Retry()], makeContext(), async () => ok)).rejects.toThrow(
      "next() called more than once by Retry",
    );
  });

  it("propagates layer and handler failures", async () => {
    const failing: PlinthLayer = {
      handle: async () => {
        throw new Error("layer failed");
      },
    };

    await expect(runLayerPipeline([failing], makeContext(), async () => ok)).rejects.toThrow("layer failed");
    await expect(
      runLayerPipeline([tracing("outer", [])], makeContext(), async () => {
        throw new Error("handler failed");
      }),
    ).rejects.toThrow("handler failed");
  });

  it("enters no further layer once cancelled", async () => {
    // Arrange
    const controller = new AbortController();
    const trail: string[] = [];
    const cancelling: PlinthLayer = {
      handle: (_ctx, next) => {
        controller.abort("client closed");
        return next();
      },
    };
    const handler = vi.fn(async () => ok);

    // Act
    const pending = runLayerPipeline(
      [cancelling, tracing("inner", trail)],
      makeContext(),
      handler,
      controller.signal,
    );

    // Assert
    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
    expect(trail).toEqual([]);
    expect(handler).not.toHaveBeenCalled();
  });
});
