import createDebug from "debug";
import type { DependencyResolver, PlinthLogger } from "@plinth/types";
import { BuildError, StartupHookError } from "../errors/build-errors";

const debug = createDebug("plinth:core:lifespan");

export type LifespanState = "NotStarted" | "Starting" | "Serving" | "ShuttingDown" | "Stopped";

/** Handed to lifespan hooks. Resolves singleton services only. */
export type LifespanContext = {
  dependencies: DependencyResolver;
  logger?: PlinthLogger;
};

export type LifespanHook = (context: LifespanContext) => void | Promise<void>;

export type ShutdownHookOptions = {
  name?: string;
  /** Overrides the manager's default shutdown timeout for this hook. */
  timeoutMs?: number;
};

type RegisteredHook = {
  name: string;
  hook: LifespanHook;
  timeoutMs?: number;
};

export type LifespanManagerOptions = {
  context: LifespanContext;
  shutdownTimeoutMs?: number;
};

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

const TIMED_OUT = Symbol("timed-out");

function hookName(hook: LifespanHook, fallback: string): string {
  return hook.name || fallback;
}

/**
 * Drives an application through
 * `NotStarted → Starting → Serving → ShuttingDown → Stopped`.
 *
 * Startup hooks run one at a time in registration order; any failure is fatal
 * and the manager ends in `Stopped`. A shutdown requested while starting runs
 * at once and the pending start never reaches `Serving`. Shutdown hooks run in reverse order,
 * each bounded by a timeout; a hook that fails or overruns is logged and
 * shutdown moves on.
 */
export class LifespanManager {
  private current: LifespanState = "NotStarted";
  private readonly startupHooks: RegisteredHook[] = [];
  private readonly shutdownHooks: RegisteredHook[] = [];
  private readonly shutdownTimeoutMs: number;
  private readonly context: LifespanContext;
  private stopping: Promise<void> | null = null;

  constructor(options: LifespanManagerOptions) {
    this.context = options.context;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
  }

  get state(): LifespanState {
    return this.current;
  }

  onStartup(hook: LifespanHook, name?: string): void {
    this.assertNotStarted("startup");
    this.startupHooks.push({ name: name ?? hookName(hook, `startup#${this.startupHooks.length + 1}`), hook });
  }

  onShutdown(hook: LifespanHook, options: ShutdownHookOptions = {}): void {
    if (this.current === "ShuttingDown" || this.current === "Stopped") {
      throw new BuildError("Cannot register a shutdown hook once shutdown has begun");
    }
    this.shutdownHooks.push({
      name: options.name ?? hookName(hook, `shutdown#${this.shutdownHooks.length + 1}`),
      hook,
      timeoutMs: options.timeoutMs,
    });
  }

  /**
   * @throws StartupHookError when a startup hook fails; the state is then `Stopped`.
   * @throws BuildError when shutdown begins before the remaining hooks have run.
   */
  async start(): Promise<void> {
    this.assertNotStarted("start");
    this.transition("Starting");

    for (const { name, hook } of this.startupHooks) {
      debug("startup hook %s", name);
      try {
        await hook(this.context);
      } catch (error) {
        if (this.current === "Starting") this.transition("Stopped");
        throw new StartupHookError(name, error);
      }
      if (this.current !== "Starting") {
        throw new BuildError(`Startup aborted after hook "${name}": shutdown began while starting`);
      }
    }

    this.transition("Serving");
  }

  /** Runs shutdown hooks once. Later calls wait for the first shutdown to finish. */
  shutdown(): Promise<void> {
    this.stopping ??= this.runShutdown();
    return this.stopping;
  }

  private async runShutdown(): Promise<void> {
    if (this.current === "NotStarted" || this.current === "Stopped") {
      this.transition("Stopped");
      return;
    }

    this.transition("ShuttingDown");
    for (const registered of [...this.shutdownHooks].reverse()) {
      await this.runShutdownHook(registered);
    }
    this.transition("Stopped");
  }

  private async runShutdownHook({ name, hook, timeoutMs }: RegisteredHook): Promise<void> {
    const limit = timeoutMs ?? this.shutdownTimeoutMs;
    const { logger } = this.context;
    debug("shutdown hook %s (timeout %dms)", name, limit);

    const running = Promise.resolve().then(() => hook(this.context));
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), limit);
    });

    try {
      const outcome = await Promise.race([running, timeout]);
      if (outcome === TIMED_OUT) {
        logger?.warn("Shutdown hook timed out", { hook: name, timeoutMs: limit });
        // The hook keeps running in the background; report a late failure.
        void running.catch((error: unknown) => {
          logger?.error("Shutdown hook failed after timing out", { hook: name, error: describe(error) });
        });
      }
    } catch (error) {
      logger?.error("Shutdown hook failed", { hook: name, error: describe(error) });
    } finally {
      clearTimeout(timer);
    }
  }

  private assertNotStarted(action: string): void {
    if (this.current !== "NotStarted") {
      throw new BuildError(`Cannot ${action === "start" ? "start" : "register a startup hook"}: lifespan is ${this.current}`);
    }
  }

  private transition(next: LifespanState): void {
    debug("%s → %s", this.current, next);
    this.current = next;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
