import { err, ok, type Result } from "@wid/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigurationError } from "./configuration-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: ConfigSource[]
}

/**
 * Merge `sources` in order (later wins), validate with `schema` and record
 * which source provided each key.
 *
 * Unreadable sources and validation failures come back as a
 * `ConfigurationError` result.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<Result<IConfig<T>, ConfigurationError>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    let values: Record<string, unknown>

    try {
      values = await source.load()
    } catch (cause) {
      return err(
        new ConfigurationError(`Configuration source "${source.name}" failed to load`, {
          context: { source: source.name },
          cause,
        }),
      )
    }

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    return err(
      new ConfigurationError(
        `Configuration validation failed:\n${z.prettifyError(result.error)}`,
        { context: { sources: resolvedSources.map((s) => s.name) } },
      ),
    )
  }

  return ok(new Config<T>(result.data, provenance, new Set(Object.keys(merged))))
}
