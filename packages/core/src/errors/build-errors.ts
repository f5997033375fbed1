/**
 * Raised while an application is being built. Every subclass signals a
 * programming error: the application never reaches the serving state.
 */
export class BuildError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BuildError";
  }
}

export class SchemaConflictError extends BuildError {
  constructor(public readonly typeId: string) {
    super(`Type "${typeId}" is already registered with a different shape`);
    this.name = "SchemaConflictError";
  }
}

export class RouteConflictError extends BuildError {
  constructor(
    public readonly method: string,
    public readonly path: string,
    public readonly existingPath: string,
  ) {
    super(
      existingPath === path
        ? `Route ${method} ${path} is declared more than once`
        : `Route ${method} ${path} conflicts with ${method} ${existingPath}`,
    );
    this.name = "RouteConflictError";
  }
}

export class RouteDefinitionError extends BuildError {
  constructor(message: string) {
    super(message);
    this.name = "RouteDefinitionError";
  }
}

export type MissingBinding = {
  /** Route (`GET /users/{id}`) or binding (`service:Repo`) that needs the dependency. */
  consumer: string;
  dependency: string;
};

export class UnresolvedDependencyError extends BuildError {
  constructor(public readonly missing: readonly MissingBinding[]) {
    const details = missing
      .map(({ consumer, dependency }) => `  ${consumer} requires ${dependency}: no binding in scope`)
      .join("\n");
    super(
      `Unresolvable dependencies detected:\n\n${details}\n\n` +
        "Bind each missing dependency with provide() on the router that declares the route or one of its ancestors.",
    );
    this.name = "UnresolvedDependencyError";
  }
}

export class CyclicDependencyError extends BuildError {
  constructor(public readonly cycle: readonly string[]) {
    super(`Circular dependency detected: ${cycle.join(" → ")}`);
    this.name = "CyclicDependencyError";
  }
}

export class DependencyScopeError extends BuildError {
  constructor(
    public readonly consumer: string,
    public readonly dependency: string,
  ) {
    super(`Singleton ${consumer} cannot depend on request-scoped ${dependency}`);
    this.name = "DependencyScopeError";
  }
}

export class UnknownSecuritySchemeError extends BuildError {
  constructor(
    public readonly scheme: string,
    public readonly route: string,
  ) {
    super(`Route ${route} references undeclared security scheme "${scheme}"`);
    this.name = "UnknownSecuritySchemeError";
  }
}

export class StartupHookError extends BuildError {
  constructor(
    public readonly hookName: string,
    cause: unknown,
  ) {
    super(
      `Startup hook "${hookName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "StartupHookError";
  }
}
