/** Environment variable holding the Workload API address. */
export const SPIFFE_ENDPOINT_SOCKET = "SPIFFE_ENDPOINT_SOCKET"

export type UnixEndpointAddress = {
  readonly kind: "unix"
  /** Absolute socket path. */
  readonly path: string
}

export type TcpEndpointAddress = {
  readonly kind: "tcp"
  /** IPv4 or IPv6 literal, IPv6 without brackets. */
  readonly host: string
  readonly port: number
}

export type EndpointAddress = UnixEndpointAddress | TcpEndpointAddress
