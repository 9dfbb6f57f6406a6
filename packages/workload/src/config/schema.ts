import { logLevelNames } from "@wid/logger"
import { z } from "zod"
import { MAX_INIT_TIMEOUT_MS } from "../core/x509-source"

export const x509SourceEnvSchema = z.object({
  // Empty means unset, as in resolveEndpointAddress.
  SPIFFE_ENDPOINT_SOCKET: z
    .string()
    .transform((value) => (value === "" ? undefined : value))
    .optional(),
  X509_SOURCE_INIT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_INIT_TIMEOUT_MS)
    .optional(),
  X509_SOURCE_WATCH_ERROR_POLICY: z.enum(["keep-last", "close"]).default("keep-last"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type X509SourceEnvConfig = z.infer<typeof x509SourceEnvSchema>
