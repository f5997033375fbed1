import type { HttpMethod, PlinthLayer } from "@plinth/types";
import { matchPathSegments, type PathSegment } from "@plinth/common";
import type { RouteDescriptor } from "../handlers/definition";
import type { BindingScope } from "../di/binding-scope";
import type { DependencyRequirement } from "../di/dependency-graph";

/** A route with every inherited property merged in and an absolute path. */
export type ComposedRoute = Omit<RouteDescriptor, "path" | "tags" | "security" | "layers"> & {
  path: string;
  segments: readonly PathSegment[];
  tags: readonly string[];
  /** Effective requirement: any listed scheme satisfies it. Empty means unsecured. */
  security: readonly string[];
  /** Router layers from root to leaf, then the route's own. */
  layers: readonly PlinthLayer[];
  scope: BindingScope;
  /** The descriptor as declared. */
  declared: RouteDescriptor;
};

export type RouteMatch =
  | { kind: "found"; route: ComposedRoute; params: Record<string, string> }
  | { kind: "method-not-allowed"; allow: HttpMethod[] }
  | { kind: "not-found" };

export function routeLabel(route: { method: HttpMethod; path: string }): string {
  return `${route.method} ${route.path}`;
}

// Positive when `a` is more specific than `b`: the first literal segment
// facing a parameter segment wins.
function compareSpecificity(a: readonly PathSegment[], b: readonly PathSegment[]): number {
  for (let i = 0; i < a.length; i++) {
    const left = a[i].type === "literal" ? 1 : 0;
    const right = b[i].type === "literal" ? 1 : 0;
    if (left !== right) return left - right;
  }
  return 0;
}

/**
 * Flat, ordered result of composing a router tree. Order is the pre-order
 * walk of the tree: a router's own routes first, then its children in the
 * order they were included.
 */
export class RouteTable implements Iterable<ComposedRoute> {
  constructor(readonly routes: readonly ComposedRoute[]) {}

  get size(): number {
    return this.routes.length;
  }

  [Symbol.iterator](): Iterator<ComposedRoute> {
    return this.routes[Symbol.iterator]();
  }

  find(method: HttpMethod, path: string): ComposedRoute | undefined {
    return this.routes.find((route) => route.method === method && route.path === path);
  }

  requirements(): DependencyRequirement[] {
    return this.routes.map((route) => ({
      consumer: routeLabel(route),
      dependencies: route.dependencies,
      scope: route.scope,
    }));
  }

  match(method: HttpMethod, path: string): RouteMatch {
    let best: { route: ComposedRoute; params: Record<string, string> } | null = null;
    const allow: HttpMethod[] = [];

    for (const route of this.routes) {
      const params = matchPathSegments(route.segments, path);
      if (!params) continue;

      if (route.method !== method) {
        if (!allow.includes(route.method)) allow.push(route.method);
        continue;
      }
      if (!best || compareSpecificity(route.segments, best.route.segments) > 0) {
        best = { route, params };
      }
    }

    if (best) return { kind: "found", ...best };
    if (allow.length > 0) return { kind: "method-not-allowed", allow };
    return { kind: "not-found" };
  }
}
