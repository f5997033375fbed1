import createDebug from "debug";
import type { PlinthLayer } from "@plinth/types";
import {
  joinRoutePath,
  parsePathTemplate,
  pathParamNames,
  pathShapeKey,
  type PathSegment,
} from "@plinth/common";
import { RouteConflictError, RouteDefinitionError } from "../errors/build-errors";
import type { RouteDescriptor } from "../handlers/definition";
import type { BindingScope } from "../di/binding-scope";
import { DependencyGraph } from "../di/dependency-graph";
import type { RouterNode } from "./router-node";
import { RouteTable, routeLabel, type ComposedRoute } from "./route-table";

const debug = createDebug("plinth:core:routing");

type Inherited = {
  prefix: string;
  tags: readonly string[];
  security: readonly string[];
  layers: readonly PlinthLayer[];
  scope: BindingScope;
};

function mergeTags(inherited: readonly string[], local: readonly string[]): string[] {
  const merged = [...inherited];
  for (const tag of local) {
    if (!merged.includes(tag)) merged.push(tag);
  }
  return merged;
}

function parseTemplate(path: string, label: string): PathSegment[] {
  let segments: PathSegment[];
  try {
    segments = parsePathTemplate(path);
  } catch (error) {
    throw new RouteDefinitionError(
      `${label}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const names = pathParamNames(segments);
  const duplicate = names.find((name, i) => names.indexOf(name) !== i);
  if (duplicate) {
    throw new RouteDefinitionError(`${label}: path parameter "${duplicate}" appears more than once`);
  }
  return segments;
}

function checkDeclaredParams(route: RouteDescriptor, segments: PathSegment[], label: string): void {
  if (!route.params) return;
  const inTemplate = pathParamNames(segments);
  const declared = Object.keys(route.params.properties);

  for (const name of declared) {
    if (!inTemplate.includes(name)) {
      throw new RouteDefinitionError(`${label}: declared parameter "${name}" is not in the path template`);
    }
  }
  for (const name of inTemplate) {
    if (!declared.includes(name)) {
      throw new RouteDefinitionError(`${label}: path parameter "${name}" is missing from params`);
    }
  }
}

/**
 * Flattens a router tree into a {@link RouteTable}. Paths are joined from the
 * root down, tags accumulate, an explicit security requirement replaces the
 * inherited one and every router's bindings are declared into `graph` in a
 * scope chained to its parent's.
 *
 * @throws RouteConflictError when two routes share a method and path shape.
 * @throws RouteDefinitionError for malformed templates or parameter mismatches.
 */
export function compose(root: RouterNode, graph: DependencyGraph = new DependencyGraph()): RouteTable {
  const routes: ComposedRoute[] = [];
  const seen = new Map<string, string>();

  const walk = (node: RouterNode, inherited: Inherited): void => {
    const prefix = joinRoutePath(inherited.prefix, node.prefix);
    const scope = graph.scope(`router ${prefix}`, inherited.scope);
    for (const { descriptor, provider } of node.providers) {
      graph.bind(descriptor, provider, scope);
    }

    const context: Inherited = {
      prefix,
      tags: mergeTags(inherited.tags, node.tags),
      security: node.security ?? inherited.security,
      layers: [...inherited.layers, ...node.layers],
      scope,
    };

    for (const route of node.routes) {
      const path = joinRoutePath(prefix, route.path);
      const label = routeLabel({ method: route.method, path });
      const segments = parseTemplate(path, label);
      checkDeclaredParams(route, segments, label);

      const key = `${route.method} ${pathShapeKey(segments)}`;
      const existing = seen.get(key);
      if (existing !== undefined) {
        throw new RouteConflictError(route.method, path, existing);
      }
      seen.set(key, path);

      debug("compose %s", label);
      routes.push({
        ...route,
        path,
        segments,
        tags: mergeTags(context.tags, route.tags),
        security: route.security ?? context.security,
        layers: [...context.layers, ...route.layers],
        scope,
        declared: route,
      });
    }

    for (const child of node.children) {
      walk(child, context);
    }
  };

  walk(root, { prefix: "/", tags: [], security: [], layers: [], scope: graph.root });
  return new RouteTable(routes);
}
