import type { PlinthLogger, PlinthTracer } from "@plinth/types";
import { defineService } from "@plinth/common";

export const LOGGER = defineService<PlinthLogger>("Logger");
export const TRACER = defineService<PlinthTracer>("Tracer");
