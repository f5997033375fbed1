import createDebug from "debug";
import type { DependencyResolver, PlinthLogger, TypeDescriptor } from "@plinth/types";
import { descriptorToString } from "@plinth/common";
import {
  DependencyUnavailableError,
  MissingBindingError,
  RequestCancelledError,
} from "../errors/runtime-errors";
import { abortable, throwIfCancelled } from "../handlers/abort";
import type { BindingScope, DependencyBinding } from "./binding-scope";
import type { DependencyGraph } from "./dependency-graph";
import {
  closeEntryFor,
  closeInReverse,
  instantiate,
  providerDependencies,
  type CloseEntry,
} from "./providers";

const debug = createDebug("plinth:core:di");

/**
 * Per-request (or per-connection) resolver. Request-scoped instances are
 * created at most once per scope and closed by {@link release}; singletons
 * come from the finalized graph.
 */
export class RequestScope implements DependencyResolver {
  private readonly instances = new Map<DependencyBinding, Promise<unknown>>();
  private readonly closeStack: CloseEntry[] = [];
  private released = false;

  constructor(
    private readonly graph: DependencyGraph,
    private readonly scope: BindingScope,
    private readonly signal?: AbortSignal,
    private readonly logger?: PlinthLogger,
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  has(descriptor: TypeDescriptor): boolean {
    return this.scope.lookup(descriptor.id) !== null;
  }

  async resolve<T>(descriptor: TypeDescriptor<T>): Promise<T> {
    throwIfCancelled(this.signal);

    const found = this.scope.lookup(descriptor.id);
    if (!found) throw new MissingBindingError(descriptorToString(descriptor));
    return (await this.resolveBinding(found.binding, found.scope)) as T;
  }

  /** Resolves every descriptor in order, as handler arguments. */
  async resolveAll(descriptors: readonly TypeDescriptor[]): Promise<unknown[]> {
    const resolved: unknown[] = [];
    for (const descriptor of descriptors) {
      resolved.push(await this.resolve(descriptor));
    }
    return resolved;
  }

  /** Closes request-scoped instances in reverse creation order. Safe to call more than once. */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    debug("release: %d resources", this.closeStack.length);
    const entries = this.closeStack.splice(0);
    await closeInReverse(entries, this.logger);
  }

  private resolveBinding(binding: DependencyBinding, owner: BindingScope): Promise<unknown> {
    if (binding.scope === "singleton") {
      return Promise.resolve(this.graph.singletonFor(binding));
    }

    const cached = this.instances.get(binding);
    if (cached) return cached;

    const pending = this.create(binding, owner);
    this.instances.set(binding, pending);
    return pending;
  }

  private async create(binding: DependencyBinding, owner: BindingScope): Promise<unknown> {
    const label = descriptorToString(binding.descriptor);
    try {
      const deps: unknown[] = [];
      for (const dependency of providerDependencies(binding.provider)) {
        const found = owner.lookup(dependency.id);
        if (!found) throw new MissingBindingError(descriptorToString(dependency));
        deps.push(await this.resolveBinding(found.binding, found.scope));
      }

      debug("create %s", label);
      const creation = instantiate(binding.provider, deps).then((instance) => this.track(label, binding, instance));
      return await abortable(creation, this.signal);
    } catch (error) {
      if (error instanceof RequestCancelledError || error instanceof DependencyUnavailableError) {
        throw error;
      }
      throw new DependencyUnavailableError(label, error);
    }
  }

  private async track(label: string, binding: DependencyBinding, instance: unknown): Promise<unknown> {
    const entry = closeEntryFor(label, binding.provider, instance);
    if (!entry) return instance;

    if (this.released) {
      // Created after the request finished: nothing else will close it.
      await closeInReverse([entry], this.logger);
    } else {
      this.closeStack.push(entry);
    }
    return instance;
  }
}
