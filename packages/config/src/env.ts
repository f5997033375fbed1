export type Platform = "aws" | "gcp" | "azure" | "local" | "other";

const PLATFORM_MAP: Record<string, Platform> = {
  aws: "aws",
  gcp: "gcp",
  azure: "azure",
  local: "local",
};

export const APP_VAR_PREFIX = "PLINTH_APP_";
export const SECRET_PREFIX = "PLINTH_SECRET_";

export class PlinthConfig {
  static getAppVar(name: string): string | undefined {
    return process.env[`${APP_VAR_PREFIX}${name}`];
  }

  static getAllAppVars(): Record<string, string> {
    return collectPrefixed(APP_VAR_PREFIX);
  }

  static getSecret(name: string): string | undefined {
    return process.env[`${SECRET_PREFIX}${name}`];
  }

  static getPlatform(): Platform {
    const raw = process.env.PLINTH_PLATFORM?.toLowerCase() ?? "";
    return PLATFORM_MAP[raw] ?? "other";
  }
}

/** Environment variables under `prefix`, keyed by the remainder of their name. */
export function collectPrefixed(
  prefix: string,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(prefix) && value !== undefined) {
      result[key.slice(prefix.length)] = value;
    }
  }
  return result;
}
