import createDebug from "debug";
import pino from "pino";
import type { PlinthLayer, PlinthTracer } from "@plinth/types";
import {
  ContextAwareLogger,
  LOGGER,
  NoopTracer,
  createTracer,
  PlinthLoggerImpl,
  TRACER,
  createLogger,
  readTelemetryEnv,
  type TelemetryConfig,
} from "@plinth/telemetry";
import { CONFIG_SERVICE, createConfigService } from "@plinth/config";
import { DependencyGraph } from "../di/dependency-graph";
import { RouteConflictError, UnknownSecuritySchemeError } from "../errors/build-errors";
import type { PreparedRoute } from "../handlers/pipeline";
import { createDefaultSystemLayers } from "../layers/system";
import { SecurityLayer, type SecuritySchemeOptions } from "../layers/security";
import { ValidationLayer, compileValidation, hasValidation } from "../layers/validate";
import { LifespanManager, type LifespanHook } from "../lifespan/lifespan-manager";
import { buildApiDocument } from "../openapi/builder";
import type { InfoObject, ServerObject, TagObject } from "../openapi/types";
import { compose } from "../routing/compose";
import { routeLabel, type ComposedRoute } from "../routing/route-table";
import type { RouterNode } from "../routing/router-node";
import { SchemaRegistry } from "../schema/registry";
import type { ModelDescriptor } from "../schema/shapes";
import { TestingApplication } from "../testing/test-app";
import { PlinthApplication } from "./application";
import { resolveSettings, type SettingsOverrides } from "./settings";

const debug = createDebug("plinth:core:factory");

export type CreateOptions = SettingsOverrides & {
  info?: InfoObject;
  servers?: ServerObject[];
  /** Descriptions for tags used by routes. */
  tags?: TagObject[];
  securitySchemes?: Record<string, SecuritySchemeOptions>;
  /** Models to document even when no route references them. */
  models?: ModelDescriptor[];
  /** App-wide layers that run after system layers but before router and route layers. */
  layers?: PlinthLayer[];
  /**
   * Override the default system layer stack.
   * @internal Used by TestingApplication.
   */
  systemLayers?: PlinthLayer[];
  telemetry?: TelemetryConfig;
  logger?: PlinthLoggerImpl;
  tracer?: PlinthTracer;
  onStartup?: LifespanHook[];
  onShutdown?: LifespanHook[];
  env?: NodeJS.ProcessEnv;
};

function checkSecurity(route: ComposedRoute, schemes: Readonly<Record<string, SecuritySchemeOptions>>): void {
  for (const scheme of route.security) {
    if (!(scheme in schemes)) {
      throw new UnknownSecuritySchemeError(scheme, routeLabel(route));
    }
  }
}

export class PlinthFactory {
  /**
   * Builds an application from a router tree: composes routes, registers
   * schemas, finalizes the dependency graph and assembles the API document.
   * Every build-time error surfaces here, before anything is served.
   */
  static async create(root: RouterNode, options: CreateOptions = {}): Promise<PlinthApplication> {
    const env = options.env ?? process.env;
    const settings = resolveSettings(options, env);
    const telemetry = options.telemetry ?? readTelemetryEnv(env);
    const logger = options.logger ?? createLogger(telemetry);
    const tracer = options.tracer ?? createTracer(telemetry);
    const systemLayers = options.systemLayers ?? createDefaultSystemLayers({ telemetry, logger, tracer });
    const appLayers = options.layers ?? [];
    const schemes = options.securitySchemes ?? {};
    debug("create: %d system layers, %d app layers", systemLayers.length, appLayers.length);

    const registry = new SchemaRegistry();
    for (const model of options.models ?? []) {
      registry.register(model);
    }

    const graph = new DependencyGraph({ logger });
    const declaredAtRoot = new Set(root.providers.map(({ descriptor }) => descriptor.id));
    if (!declaredAtRoot.has(LOGGER.id)) {
      graph.bind(LOGGER, { useValue: new ContextAwareLogger(logger) });
    }
    if (!declaredAtRoot.has(TRACER.id)) {
      graph.bind(TRACER, { useValue: tracer });
    }
    if (!declaredAtRoot.has(CONFIG_SERVICE.id)) {
      graph.bind(CONFIG_SERVICE, { useFactory: () => createConfigService(env) });
    }

    const table = compose(root, graph);

    const prepared = new Map<ComposedRoute, PreparedRoute>();
    const allLayers: PlinthLayer[] = [...systemLayers, ...appLayers];
    for (const route of table) {
      checkSecurity(route, schemes);
      if (settings.docsPath && route.method === "GET" && route.path === settings.docsPath) {
        throw new RouteConflictError(route.method, route.path, settings.docsPath);
      }

      const compiled = compileValidation(route, registry);
      const layers: PlinthLayer[] = [
        ...systemLayers,
        ...(route.security.length > 0 ? [new SecurityLayer(route.security, schemes)] : []),
        ...appLayers,
        ...route.layers,
        ...(hasValidation(compiled) ? [new ValidationLayer(compiled, registry)] : []),
      ];
      allLayers.push(...route.layers);
      prepared.set(route, { route, layers });
    }

    const document = buildApiDocument(table, registry, {
      info: options.info ?? { title: telemetry.serviceName, version: telemetry.serviceVersion },
      servers: options.servers,
      securitySchemes: schemes,
      tags: options.tags,
    });
    registry.seal();

    // Singletons open last: nothing after this point may fail the build.
    await graph.finalize(table.requirements());

    const lifespan = new LifespanManager({
      context: { dependencies: graph.singletonResolver(), logger },
      shutdownTimeoutMs: settings.shutdownTimeoutMs,
    });
    for (const hook of options.onStartup ?? []) lifespan.onStartup(hook);
    for (const hook of options.onShutdown ?? []) lifespan.onShutdown(hook);

    debug("create: %d routes ready", table.size);
    return new PlinthApplication({
      table,
      prepared,
      registry,
      graph,
      document,
      lifespan,
      settings,
      layers: allLayers,
      logger,
    });
  }

  /**
   * Builds and starts an application for in-process tests. System layers
   * and logging are off unless supplied.
   */
  static async createTestingApp(root: RouterNode, options: CreateOptions = {}): Promise<TestingApplication> {
    debug("createTestingApp");
    const app = await PlinthFactory.create(root, {
      systemLayers: [],
      logger: new PlinthLoggerImpl(pino({ enabled: false })),
      tracer: new NoopTracer(),
      env: {},
      ...options,
    });
    await app.start();
    return new TestingApplication(app);
  }
}
