/**
 * Zod runtime schemas for project configuration.
 *
 * Optional features fall back to their defaults when a value is missing or
 * malformed: the absence of an optional feature is not a failure.
 */

import { z } from "zod";

export const LiveReloadConfigSchema = z.object({
  enabled: z.boolean().catch(false),
});

export const SessionConfigSchema = z.object({
  cookieName: z.string().min(1).catch("id"),
  /** Idle lifetime of a session; unset means the session lives as long as the store keeps it. */
  ttlSeconds: z.number().int().positive().optional().catch(undefined),
  secure: z.boolean().catch(true),
});

// Defaults are built per parse: callers own and may mutate the result.
const defaultSessionConfig = () => ({ cookieName: "id", ttlSeconds: undefined, secure: true });

export const MiddlewareConfigSchema = z.object({
  liveReload: LiveReloadConfigSchema.catch(() => ({ enabled: false })),
  session: SessionConfigSchema.catch(defaultSessionConfig),
});

export const ProjectConfigSchema = z.object({
  debug: z.boolean().catch(false),
  middlewares: MiddlewareConfigSchema.catch(() => ({
    liveReload: { enabled: false },
    session: defaultSessionConfig(),
  })),
});

export type LiveReloadConfig = z.infer<typeof LiveReloadConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type MiddlewareConfig = z.infer<typeof MiddlewareConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}
