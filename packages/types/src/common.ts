// Constructor type for class providers. `any[]` because typed constructors are not
// assignable to `new (...args: unknown[]) => T`.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

export type TypeDescriptorKind = "model" | "service";

/**
 * Stable identifier for a declared model or service. The join key between the
 * schema registry and the dependency graph. Two descriptors are the same type
 * iff their `id`s are equal.
 *
 * `__type` is never set at runtime; it carries `T` for inference.
 */
export interface TypeDescriptor<T = unknown> {
  readonly id: string;
  readonly kind: TypeDescriptorKind;
  readonly __type?: T;
}

/** Resolves a tuple of descriptors to the tuple of instance types they stand for. */
export type ResolvedDescriptors<D extends readonly TypeDescriptor[]> = {
  -readonly [K in keyof D]: D[K] extends TypeDescriptor<infer T> ? T : never;
};

// Service cleanup contract for framework-managed instances
export interface Closeable {
  close(): Promise<void> | void;
}

/**
 * `singleton` instances are created once while the dependency graph is
 * finalized and shared by every request. `request` instances are created per
 * request (or WebSocket connection) and released when it completes.
 */
export type ProviderScope = "singleton" | "request";

type ProviderBase<T> = {
  scope?: ProviderScope;
  onClose?: (value: T) => Promise<void> | void;
};

export type ClassProvider<T = unknown> = ProviderBase<T> & {
  useClass: Type<T>;
  inject?: readonly TypeDescriptor[];
};

export type FactoryProvider<T = unknown> = ProviderBase<T> & {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  useFactory: (...args: any[]) => T | Promise<T>;
  inject?: readonly TypeDescriptor[];
};

export type ValueProvider<T = unknown> = {
  useValue: T;
  onClose?: (value: T) => Promise<void> | void;
};

export type Provider<T = unknown> = ClassProvider<T> | FactoryProvider<T> | ValueProvider<T>;

export type NextFunction<R> = () => Promise<R>;
