import { CorsOptions } from "cors";

/**
 * CORS_ORIGINS is a comma-separated origin list; any origin when unset
 */
export function getCorsOptions(env: NodeJS.ProcessEnv = process.env): CorsOptions {
  const origins = (env.CORS_ORIGINS ?? "")
    .split(",")
    .map(origin => origin.trim())
    .filter(Boolean);

  return origins.length > 0 ? { origin: origins } : {};
}
