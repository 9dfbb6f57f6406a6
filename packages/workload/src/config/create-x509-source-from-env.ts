import { createPinoLogger } from "@wid/logger"
import type { SourceResult } from "../ports/source"
import {
  type CreateX509SourceError,
  createX509Source,
  type X509Source,
  type X509SourceDeps,
} from "../core/x509-source"
import { loadX509SourceConfig } from "./load-x509-source-config"

export type CreateX509SourceFromEnvDeps = Omit<X509SourceDeps, "env"> & {
  /** @default process.env */
  env?: NodeJS.ProcessEnv

  /** Directory holding `.env.<NODE_ENV>`. @default process.cwd() */
  cwd?: string
}

/**
 * Loads settings from the environment, builds a pino logger from
 * `LOG_LEVEL`/`LOG_PRETTY` unless `deps.logger` is given, and creates the
 * source.
 */
export async function createX509SourceFromEnv(
  deps: CreateX509SourceFromEnvDeps = {},
): Promise<SourceResult<X509Source, CreateX509SourceError>> {
  const { env = process.env, cwd, ...sourceDeps } = deps

  const config = await loadX509SourceConfig(env, cwd)
  if (!config.ok) return config

  const logger = sourceDeps.logger ?? createPinoLogger({}, config.value.logging)

  return createX509Source({ ...sourceDeps, env, logger }, config.value.source)
}
