import createDebug from "debug";
import type { HandlerContext, HandlerResponse, PlinthLayer } from "@plinth/types";
import { throwIfCancelled } from "../handlers/abort";

const debug = createDebug("plinth:core:layers");

function layerName(layer: PlinthLayer): string {
  return layer.constructor.name || "anonymous layer";
}

/**
 * Runs `layers` in order around `handler`. Each layer continues the chain by
 * calling `next()` at most once; not calling it short-circuits with the
 * layer's own response. Once `signal` aborts, no further layer is entered.
 */
export function runLayerPipeline(
  layers: readonly PlinthLayer[],
  context: HandlerContext,
  handler: () => Promise<HandlerResponse>,
  signal?: AbortSignal,
): Promise<HandlerResponse> {
  debug("%d layers for %s %s", layers.length, context.request.method, context.request.path);

  const enter = async (position: number): Promise<HandlerResponse> => {
    throwIfCancelled(signal);
    if (position === layers.length) return handler();

    const layer = layers[position];
    let called = false;
    return layer.handle(context, () => {
      if (called) {
        return Promise.reject(new Error(`next() called more than once by ${layerName(layer)}`));
      }
      called = true;
      return enter(position + 1);
    });
  };

  return enter(0);
}
