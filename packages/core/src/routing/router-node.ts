import type { PlinthLayer, Provider, TypeDescriptor } from "@plinth/types";
import { RouteDefinitionError } from "../errors/build-errors";
import type { RouteDescriptor } from "../handlers/definition";

export type ProviderDeclaration = {
  descriptor: TypeDescriptor;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  provider: Provider<any>;
};

/**
 * A path-prefixed group of routes. Routers nest: children inherit the
 * prefix, tags, security requirement, layers and dependency bindings of
 * every ancestor. A router belongs to at most one parent.
 *
 * @example
 * const users = new RouterNode("/users")
 *   .tag("users")
 *   .provide(Database, { useFactory: connect })
 *   .route(getUser, createUser);
 * const api = new RouterNode("/api").secure("bearer").include(users);
 */
export class RouterNode {
  private readonly localRoutes: RouteDescriptor[] = [];
  private readonly childNodes: RouterNode[] = [];
  private readonly localTags: string[] = [];
  private readonly localProviders: ProviderDeclaration[] = [];
  private readonly localLayers: PlinthLayer[] = [];
  private localSecurity: string[] | undefined;
  private parentNode: RouterNode | null = null;

  constructor(readonly prefix: string = "/") {}

  route(...routes: RouteDescriptor[]): this {
    this.localRoutes.push(...routes);
    return this;
  }

  include(...children: RouterNode[]): this {
    for (const child of children) {
      if (child.parentNode) {
        throw new RouteDefinitionError(
          `Router "${child.prefix}" is already included under "${child.parentNode.prefix}"`,
        );
      }
      if (child === this || child.isAncestorOf(this)) {
        throw new RouteDefinitionError(`Router "${child.prefix}" cannot include one of its ancestors`);
      }
      child.parentNode = this;
      this.childNodes.push(child);
    }
    return this;
  }

  tag(...tags: string[]): this {
    for (const tag of tags) {
      if (!this.localTags.includes(tag)) this.localTags.push(tag);
    }
    return this;
  }

  /**
   * Sets this router's security requirement, replacing the inherited one.
   * Calling it with no schemes removes security for this subtree.
   */
  secure(...schemes: string[]): this {
    this.localSecurity = [...schemes];
    return this;
  }

  provide<T>(descriptor: TypeDescriptor<T>, provider: Provider<T>): this {
    this.localProviders.push({ descriptor, provider });
    return this;
  }

  use(...layers: PlinthLayer[]): this {
    this.localLayers.push(...layers);
    return this;
  }

  get parent(): RouterNode | null {
    return this.parentNode;
  }

  get routes(): readonly RouteDescriptor[] {
    return this.localRoutes;
  }

  get children(): readonly RouterNode[] {
    return this.childNodes;
  }

  get tags(): readonly string[] {
    return this.localTags;
  }

  /** `undefined` when this router inherits its parent's requirement. */
  get security(): readonly string[] | undefined {
    return this.localSecurity;
  }

  get providers(): readonly ProviderDeclaration[] {
    return this.localProviders;
  }

  get layers(): readonly PlinthLayer[] {
    return this.localLayers;
  }

  private isAncestorOf(node: RouterNode): boolean {
    for (let current = node.parentNode; current; current = current.parentNode) {
      if (current === this) return true;
    }
    return false;
  }
}
