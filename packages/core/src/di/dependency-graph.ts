import createDebug from "debug";
import type {
  DependencyResolver,
  PlinthLogger,
  Provider,
  TypeDescriptor,
} from "@plinth/types";
import { descriptorToString } from "@plinth/common";
import {
  BuildError,
  CyclicDependencyError,
  DependencyScopeError,
  UnresolvedDependencyError,
  type MissingBinding,
} from "../errors/build-errors";
import { MissingBindingError } from "../errors/runtime-errors";
import { BindingScope, type DependencyBinding } from "./binding-scope";
import {
  closeEntryFor,
  closeInReverse,
  instantiate,
  isValueProvider,
  providerDependencies,
  providerKind,
  type CloseEntry,
} from "./providers";
import { RequestScope } from "./request-scope";

const debug = createDebug("plinth:core:di");

/** Dependencies a route (or WebSocket endpoint) asks for, and the scope it resolves them from. */
export type DependencyRequirement = {
  consumer: string;
  dependencies: readonly TypeDescriptor[];
  scope: BindingScope;
};

export type DependencyGraphOptions = {
  logger?: PlinthLogger;
};

/**
 * Owns every dependency binding of an application. Bindings are declared into
 * {@link BindingScope}s while routers are composed; `finalize()` then checks
 * the whole graph and instantiates singletons before any request is served.
 */
export class DependencyGraph {
  readonly root: BindingScope;
  private readonly scopes: BindingScope[] = [];
  private readonly singletons = new Map<DependencyBinding, unknown>();
  private closeStack: CloseEntry[] = [];
  private finalized = false;
  private logger?: PlinthLogger;

  constructor(options: DependencyGraphOptions = {}) {
    this.logger = options.logger;
    this.root = this.scope("root", null);
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /** Logger used for close failures. Set once the application logger exists. */
  setLogger(logger: PlinthLogger): void {
    this.logger = logger;
  }

  scope(owner: string, parent: BindingScope | null): BindingScope {
    this.assertOpen();
    const scope = new BindingScope(owner, parent);
    this.scopes.push(scope);
    return scope;
  }

  /**
   * Declares how to provide `descriptor` in `target`. Providers default to
   * singleton scope; value providers are always singletons.
   */
  bind<T>(descriptor: TypeDescriptor<T>, provider: Provider<T>, target: BindingScope = this.root): void {
    this.assertOpen();
    const scope = isValueProvider(provider) ? "singleton" : (provider.scope ?? "singleton");
    debug("bind %s (%s, %s) in %s", descriptorToString(descriptor), providerKind(provider), scope, target.owner);
    target.set({ descriptor, scope, provider, declaredAt: target.owner });
  }

  /**
   * Checks every route requirement and every binding's own dependencies, then
   * instantiates each singleton once in dependency order.
   *
   * @throws UnresolvedDependencyError listing every missing binding at once.
   * @throws CyclicDependencyError on the first cycle found.
   * @throws DependencyScopeError when a singleton depends on a request-scoped binding.
   */
  async finalize(requirements: readonly DependencyRequirement[]): Promise<void> {
    this.assertOpen();
    const order = this.check(requirements);
    this.finalized = true;

    for (const binding of order) {
      if (binding.scope !== "singleton") continue;
      await this.instantiateSingleton(binding);
    }
    debug("finalize: %d singletons ready", this.singletons.size);
  }

  /** Starts a per-request scope resolving from `scope`. Release it when the request completes. */
  createRequestScope(scope: BindingScope, signal?: AbortSignal, logger?: PlinthLogger): RequestScope {
    return new RequestScope(this, scope, signal, logger ?? this.logger);
  }

  resolve<T>(descriptor: TypeDescriptor<T>, context: RequestScope): Promise<T> {
    return context.resolve(descriptor);
  }

  /** Resolver over singletons visible from `scope`, for code that runs outside a request. */
  singletonResolver(scope: BindingScope = this.root): DependencyResolver {
    return {
      resolve: async <T>(descriptor: TypeDescriptor<T>): Promise<T> => {
        const found = scope.lookup(descriptor.id);
        if (!found) throw new MissingBindingError(descriptorToString(descriptor));
        if (found.binding.scope !== "singleton") {
          throw new DependencyScopeError(scope.owner, descriptorToString(descriptor));
        }
        return this.singletonFor(found.binding) as T;
      },
      has: (descriptor) => scope.lookup(descriptor.id) !== null,
    };
  }

  singletonFor(binding: DependencyBinding): unknown {
    if (!this.singletons.has(binding)) {
      throw new BuildError(
        `Singleton ${descriptorToString(binding.descriptor)} is not available before the dependency graph is finalized`,
      );
    }
    return this.singletons.get(binding);
  }

  async closeAll(): Promise<void> {
    debug("closeAll: %d resources", this.closeStack.length);
    const entries = this.closeStack;
    this.closeStack = [];
    await closeInReverse(entries, this.logger);
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new BuildError("Dependency graph is already finalized");
    }
  }

  /** Validates the graph and returns every reachable binding in dependency order. */
  private check(requirements: readonly DependencyRequirement[]): DependencyBinding[] {
    const missing: MissingBinding[] = [];
    const seenMissing = new Set<string>();
    const order: DependencyBinding[] = [];
    const done = new Set<DependencyBinding>();
    const stack: DependencyBinding[] = [];

    const recordMissing = (consumer: string, dependency: TypeDescriptor): void => {
      const entry = { consumer, dependency: descriptorToString(dependency) };
      const key = `${entry.consumer}|${entry.dependency}`;
      if (seenMissing.has(key)) return;
      seenMissing.add(key);
      missing.push(entry);
    };

    const visit = (binding: DependencyBinding, owner: BindingScope): void => {
      if (done.has(binding)) return;
      const index = stack.indexOf(binding);
      if (index >= 0) {
        const cycle = [...stack.slice(index), binding].map((b) => descriptorToString(b.descriptor));
        throw new CyclicDependencyError(cycle);
      }

      stack.push(binding);
      const consumer = descriptorToString(binding.descriptor);
      for (const dependency of providerDependencies(binding.provider)) {
        const found = owner.lookup(dependency.id);
        if (!found) {
          recordMissing(consumer, dependency);
          continue;
        }
        if (binding.scope === "singleton" && found.binding.scope === "request") {
          throw new DependencyScopeError(consumer, descriptorToString(dependency));
        }
        visit(found.binding, found.scope);
      }
      stack.pop();

      done.add(binding);
      order.push(binding);
    };

    for (const requirement of requirements) {
      for (const dependency of requirement.dependencies) {
        const found = requirement.scope.lookup(dependency.id);
        if (found) {
          visit(found.binding, found.scope);
        } else {
          recordMissing(requirement.consumer, dependency);
        }
      }
    }

    for (const scope of this.scopes) {
      for (const binding of scope.own()) {
        visit(binding, scope);
      }
    }

    if (missing.length > 0) {
      throw new UnresolvedDependencyError(missing);
    }
    return order;
  }

  private async instantiateSingleton(binding: DependencyBinding): Promise<void> {
    const label = descriptorToString(binding.descriptor);
    const owner = this.ownerOf(binding);
    const deps = providerDependencies(binding.provider).map((dependency) => {
      const found = owner.lookup(dependency.id);
      if (!found) throw new MissingBindingError(descriptorToString(dependency));
      return this.singletonFor(found.binding);
    });

    let instance: unknown;
    try {
      instance = await instantiate(binding.provider, deps);
    } catch (error) {
      await this.closeAll();
      throw new BuildError(
        `Singleton ${label} failed to initialize: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    debug("instantiated singleton %s", label);
    this.singletons.set(binding, instance);
    const entry = closeEntryFor(label, binding.provider, instance);
    if (entry) this.closeStack.push(entry);
  }

  private ownerOf(binding: DependencyBinding): BindingScope {
    const owner = this.scopes.find((scope) => scope.own().includes(binding));
    if (!owner) {
      throw new BuildError(`Binding ${descriptorToString(binding.descriptor)} has no declaring scope`);
    }
    return owner;
  }
}
