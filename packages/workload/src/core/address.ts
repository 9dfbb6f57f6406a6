import { isIP } from "node:net"
import { err, ok, type Result } from "@wid/errors"
import { ConfigurationError } from "@wid/config"
import { type EndpointAddress, SPIFFE_ENDPOINT_SOCKET } from "../ports/endpoint-address"

/**
 * The explicit `override`, else `SPIFFE_ENDPOINT_SOCKET` from `env`, parsed.
 */
export function resolveEndpointAddress(
  override?: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Result<EndpointAddress, ConfigurationError> {
  const address = override ?? env[SPIFFE_ENDPOINT_SOCKET]

  if (address === undefined || address === "") {
    return err(
      new ConfigurationError(
        `Workload API address is not configured; set ${SPIFFE_ENDPOINT_SOCKET} or pass endpointAddress`,
      ),
    )
  }

  return parseEndpointAddress(address)
}

/**
 * Accepts `unix:///path/to.sock`, `unix:/path/to.sock` and `tcp://<ip>:<port>`.
 */
export function parseEndpointAddress(
  address: string,
): Result<EndpointAddress, ConfigurationError> {
  const url = toUrl(address)
  if (!url) return invalid(address, "not a valid URI")

  if (url.username !== "" || url.password !== "") {
    return invalid(address, "must not include user info")
  }
  if (url.search !== "" || url.hash !== "") {
    return invalid(address, "must not include a query or fragment")
  }

  switch (url.protocol) {
    case "unix:":
      if (url.host !== "") return invalid(address, "unix socket URI must not include an authority")
      if (!url.pathname.startsWith("/")) {
        return invalid(address, "unix socket URI must include an absolute path")
      }
      if (url.pathname === "/") return invalid(address, "unix socket URI must include a path")

      const path = decodePath(url.pathname)
      if (path === undefined) return invalid(address, "malformed percent-encoding in path")

      return ok({ kind: "unix", path })

    case "tcp:": {
      const host = url.hostname.replace(/^\[(.*)\]$/, "$1")

      if (isIP(host) === 0) return invalid(address, "tcp URI host must be an IP address")
      if (url.port === "") return invalid(address, "tcp URI must include a port")
      if (url.pathname !== "") return invalid(address, "tcp URI must not include a path")

      return ok({ kind: "tcp", host, port: Number(url.port) })
    }

    default:
      return invalid(address, 'scheme must be "unix" or "tcp"')
  }
}

export function formatEndpointAddress(address: EndpointAddress): string {
  if (address.kind === "unix") return `unix://${address.path}`

  return isIP(address.host) === 6
    ? `tcp://[${address.host}]:${address.port}`
    : `tcp://${address.host}:${address.port}`
}

function toUrl(address: string): URL | undefined {
  return URL.canParse(address) ? new URL(address) : undefined
}

function decodePath(pathname: string): string | undefined {
  try {
    return decodeURIComponent(pathname)
  } catch (cause) {
    if (cause instanceof URIError) return undefined
    throw cause
  }
}

function invalid(address: string, reason: string): Result<never, ConfigurationError> {
  return err(
    new ConfigurationError(`Invalid Workload API address "${address}": ${reason}`, {
      context: { address, reason },
    }),
  )
}
