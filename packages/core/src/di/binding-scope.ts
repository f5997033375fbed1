import type { ProviderScope, TypeDescriptor } from "@plinth/types";
import type { AnyProvider } from "./providers";

export type DependencyBinding = {
  descriptor: TypeDescriptor;
  scope: ProviderScope;
  provider: AnyProvider;
  /** Label of the router that declared the binding, used in error messages. */
  declaredAt: string;
};

export type ScopedBinding = {
  binding: DependencyBinding;
  /** Scope the binding was declared in; its own dependencies resolve from here. */
  scope: BindingScope;
};

/**
 * Bindings visible from one router. Lookups fall back to the parent chain,
 * so a binding declared closer to the route shadows an ancestor's.
 */
export class BindingScope {
  private readonly bindings = new Map<string, DependencyBinding>();

  constructor(
    readonly owner: string,
    readonly parent: BindingScope | null = null,
  ) {}

  set(binding: DependencyBinding): void {
    this.bindings.set(binding.descriptor.id, binding);
  }

  lookup(id: string): ScopedBinding | null {
    const binding = this.bindings.get(id);
    if (binding) return { binding, scope: this };
    return this.parent ? this.parent.lookup(id) : null;
  }

  /** Bindings declared directly in this scope, in declaration order. */
  own(): DependencyBinding[] {
    return [...this.bindings.values()];
  }
}
