import createDebug from "debug";
import type {
  ClassProvider,
  FactoryProvider,
  PlinthLogger,
  Provider,
  TypeDescriptor,
  ValueProvider,
} from "@plinth/types";

const debug = createDebug("plinth:core:di");

// Used where bindings of different instance types share one collection.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnyProvider = Provider<any>;

export type CloseEntry = {
  label: string;
  close: () => Promise<void> | void;
};

const CLOSE_METHODS = ["close", "end", "quit", "disconnect", "$disconnect", "destroy"] as const;

export function isClassProvider<T>(p: Provider<T>): p is ClassProvider<T> {
  return "useClass" in p;
}

export function isFactoryProvider<T>(p: Provider<T>): p is FactoryProvider<T> {
  return "useFactory" in p;
}

export function isValueProvider<T>(p: Provider<T>): p is ValueProvider<T> {
  return "useValue" in p;
}

export function providerKind(p: AnyProvider): "class" | "factory" | "value" {
  return isClassProvider(p) ? "class" : isFactoryProvider(p) ? "factory" : "value";
}

export function providerDependencies(p: AnyProvider): readonly TypeDescriptor[] {
  if (isValueProvider(p)) return [];
  return p.inject ?? [];
}

export async function instantiate(p: AnyProvider, deps: unknown[]): Promise<unknown> {
  if (isValueProvider(p)) return p.useValue;
  if (isClassProvider(p)) return new p.useClass(...deps);
  return p.useFactory(...deps);
}

export function detectCloseMethod(value: unknown): (() => Promise<void>) | null {
  if (typeof value !== "object" || value === null) return null;

  for (const method of CLOSE_METHODS) {
    const candidate: unknown = Reflect.get(value, method);
    if (typeof candidate === "function") {
      return async () => {
        await Reflect.apply(candidate, value, []);
      };
    }
  }

  return null;
}

/** Close entry for an instance, preferring the provider's `onClose` over duck-typed methods. */
export function closeEntryFor(label: string, p: AnyProvider, instance: unknown): CloseEntry | null {
  const { onClose } = p;
  if (onClose) {
    return { label, close: () => onClose(instance) };
  }
  const close = detectCloseMethod(instance);
  return close ? { label, close } : null;
}

/** Runs close entries in reverse order. Failures are logged and do not stop the rest. */
export async function closeInReverse(entries: readonly CloseEntry[], logger?: PlinthLogger): Promise<void> {
  for (const entry of [...entries].reverse()) {
    try {
      debug("closing %s", entry.label);
      await entry.close();
    } catch (error) {
      debug("close %s failed: %O", entry.label, error);
      logger?.error("Failed to close dependency", {
        dependency: entry.label,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
