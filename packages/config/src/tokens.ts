import { defineService } from "@plinth/common";
import type { ConfigService } from "./config-service";

export const CONFIG_SERVICE = defineService<ConfigService>("ConfigService");
