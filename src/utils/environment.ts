/**
 * Resolver environment
 * Reads the process-wide overrides once so the resolver stays pure
 */

import { ResolverEnvironmentSchema } from "../types";
import type { ResolverEnvironment } from "../types";

export function readResolverEnvironment(
  env: Record<string, string | undefined> = process.env,
): ResolverEnvironment {
  const parsed = ResolverEnvironmentSchema.parse({
    FLAGS_webtext_prefix: env.FLAGS_webtext_prefix || undefined,
    FLAGS_mean_count: env.FLAGS_mean_count || undefined,
  });

  return {
    webtextPrefix: parsed.FLAGS_webtext_prefix,
    meanCount: parsed.FLAGS_mean_count,
  };
}
