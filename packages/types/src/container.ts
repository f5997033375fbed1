import type { TypeDescriptor } from "./common";

/** Resolution contract handed to layers, handlers and lifespan hooks. */
export interface DependencyResolver {
  resolve<T>(descriptor: TypeDescriptor<T>): Promise<T>;
  has(descriptor: TypeDescriptor): boolean;
}
