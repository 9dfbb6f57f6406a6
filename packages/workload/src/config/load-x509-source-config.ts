import {
  type ConfigSource,
  type ConfigurationError,
  DotenvSource,
  EnvSource,
  loadConfig,
} from "@wid/config"
import { err, ok, type Result } from "@wid/errors"
import type { LoggerOptions } from "@wid/logger"
import type { X509SourceOptions } from "../core/x509-source"
import { type X509SourceEnvConfig, x509SourceEnvSchema } from "./schema"

export type X509SourceConfig = {
  source: X509SourceOptions
  logging: LoggerOptions
}

export function mapEnvToX509SourceConfig(env: X509SourceEnvConfig): X509SourceConfig {
  return {
    source: {
      watchErrorPolicy: env.X509_SOURCE_WATCH_ERROR_POLICY,
      ...(env.SPIFFE_ENDPOINT_SOCKET !== undefined && {
        endpointAddress: env.SPIFFE_ENDPOINT_SOCKET,
      }),
      ...(env.X509_SOURCE_INIT_TIMEOUT_MS !== undefined && {
        initTimeoutMs: env.X509_SOURCE_INIT_TIMEOUT_MS,
      }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Reads `.env.<NODE_ENV>` (when present) under `cwd`, then `env`.
 */
export async function loadX509SourceConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<Result<X509SourceConfig, ConfigurationError>> {
  const sources: ConfigSource[] = [new EnvSource({ env })]

  if (env.NODE_ENV) {
    sources.unshift(new DotenvSource({ file: `.env.${env.NODE_ENV}`, required: false, cwd }))
  }

  const result = await loadConfig({ schema: x509SourceEnvSchema, sources })
  if (!result.ok) return err(result.error)

  return ok(mapEnvToX509SourceConfig(result.value.value))
}
