import type { TypeDescriptor } from "@plinth/types";

/**
 * Declares a service descriptor used as a dependency-injection key.
 *
 * @example
 * const Database = defineService<DatabaseClient>("Database");
 */
export function defineService<T>(id: string): TypeDescriptor<T> {
  if (!id) {
    throw new TypeError("Service descriptors need a non-empty id");
  }
  const descriptor: TypeDescriptor<T> = { id, kind: "service" };
  return Object.freeze(descriptor);
}

export function descriptorToString(descriptor: TypeDescriptor): string {
  return `${descriptor.kind}:${descriptor.id}`;
}
