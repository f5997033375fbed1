import type { DependencyResolver, PlinthLogger, PlinthTracer } from "@plinth/types";
import { LOGGER, TRACER } from "./tokens";

export async function getLogger(dependencies: DependencyResolver): Promise<PlinthLogger> {
  return dependencies.resolve(LOGGER);
}

export async function getTracer(dependencies: DependencyResolver): Promise<PlinthTracer> {
  return dependencies.resolve(TRACER);
}
