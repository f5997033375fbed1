import createDebug from "debug";
import type { ObjectNode, SchemaNode } from "@plinth/types";
import { BuildError, SchemaConflictError } from "../errors/build-errors";
import { UnknownTypeError } from "../errors/runtime-errors";
import type { ModelDescriptor, ObjectShape, Shape } from "./shapes";

const debug = createDebug("plinth:core:schema");

/** Read side of the registry, as used by validation and documentation. */
export interface SchemaLookup {
  resolve(typeId: string): SchemaNode;
}

/**
 * Converts model shapes into canonical SchemaNodes, one per model id.
 *
 * Nested models are always stored as Reference nodes, so a model that refers
 * to itself (directly or through other models) is built exactly once. A
 * model id is bound to one structure for the life of the registry.
 */
export class SchemaRegistry implements SchemaLookup {
  private readonly nodes = new Map<string, ObjectNode>();
  private readonly canonical = new Map<string, string>();
  private readonly memo = new Map<string, ModelDescriptor>();
  private readonly inProgress = new Set<string>();
  private sealed = false;

  /**
   * Registers a model and every model it references. Re-registering an id with
   * an identical shape returns the existing node; a different shape throws
   * SchemaConflictError.
   */
  register(descriptor: ModelDescriptor, shape?: ObjectShape): ObjectNode {
    return this.registerModel(descriptor, shape);
  }

  /** @throws UnknownTypeError when `typeId` was never registered. */
  resolve(typeId: string): ObjectNode {
    const node = this.nodes.get(typeId);
    if (!node) throw new UnknownTypeError(typeId);
    return node;
  }

  has(typeId: string): boolean {
    return this.nodes.has(typeId);
  }

  /** Registered models in registration order. */
  entries(): [string, ObjectNode][] {
    return [...this.nodes.entries()];
  }

  /** Builds the node for an anonymous shape, registering the models it references. */
  nodeFor(shape: Shape): SchemaNode {
    return this.toNode(shape);
  }

  /** After sealing, only already-registered models may be referenced. */
  seal(): void {
    debug("seal: %d models", this.nodes.size);
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private registerModel(descriptor: ModelDescriptor, shape?: ObjectShape): ObjectNode {
    const existing = this.nodes.get(descriptor.id);
    if (existing && !shape && this.memo.get(descriptor.id) === descriptor) {
      return existing;
    }
    if (this.sealed) {
      throw new BuildError(
        `Cannot register "${descriptor.id}": the schema registry is sealed once the application is built`,
      );
    }

    this.inProgress.add(descriptor.id);
    let node: SchemaNode;
    try {
      node = this.toNode(shape ?? descriptor.shape());
    } finally {
      this.inProgress.delete(descriptor.id);
    }
    if (node.type !== "object") {
      throw new BuildError(`Model "${descriptor.id}" must have an object shape`);
    }

    const key = canonicalJson(node);
    const known = this.canonical.get(descriptor.id);
    if (known !== undefined) {
      if (known !== key) throw new SchemaConflictError(descriptor.id);
      debug("register %s → identical, no-op", descriptor.id);
      return this.resolve(descriptor.id);
    }

    debug("register %s", descriptor.id);
    this.nodes.set(descriptor.id, node);
    this.canonical.set(descriptor.id, key);
    this.memo.set(descriptor.id, descriptor);
    return node;
  }

  private toNode(shape: Shape): SchemaNode {
    switch (shape.shape) {
      case "scalar":
        return { type: "scalar", kind: shape.kind, constraints: [...shape.constraints] };
      case "array":
        return { type: "array", items: this.toNode(shape.items) };
      case "map":
        return { type: "map", values: this.toNode(shape.values) };
      case "nullable":
        return { type: "nullable", inner: this.toNode(shape.inner) };
      case "optional":
        // Optionality belongs to the enclosing object's `required` list.
        return this.toNode(shape.inner);
      case "object": {
        const properties: Record<string, SchemaNode> = {};
        const required: string[] = [];
        for (const [name, property] of Object.entries(shape.properties)) {
          properties[name] = this.toNode(property);
          if (property.shape !== "optional") required.push(name);
        }
        return { type: "object", properties, required };
      }
      case "ref": {
        const { model } = shape;
        if (!this.inProgress.has(model.id)) this.registerModel(model);
        return { type: "reference", target: model.id };
      }
    }
  }
}

/** Stable JSON form of a node: object keys sorted, `required` sorted. */
export function canonicalJson(node: SchemaNode): string {
  return JSON.stringify(node, (_key, value: unknown) => {
    if (Array.isArray(value) || typeof value !== "object" || value === null) return value;
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      sorted[key] = key === "required" && Array.isArray(entry) ? [...entry].sort() : entry;
    }
    return sorted;
  });
}
