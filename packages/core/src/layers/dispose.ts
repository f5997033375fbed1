import createDebug from "debug";
import type { PlinthLayer, PlinthLogger } from "@plinth/types";

const debug = createDebug("plinth:core:layers");

/**
 * Disposes layers in reverse order. A layer shared by several routes is
 * disposed once. Failures are logged; disposal continues for the rest.
 */
export async function disposeLayers(layers: readonly PlinthLayer[], logger?: PlinthLogger): Promise<void> {
  const unique = [...new Set(layers)];
  for (const layer of unique.reverse()) {
    if (!layer.dispose) continue;
    try {
      await layer.dispose();
    } catch (error) {
      debug("dispose %s failed: %O", layer.constructor.name, error);
      logger?.error("Failed to dispose layer", {
        layer: layer.constructor.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
