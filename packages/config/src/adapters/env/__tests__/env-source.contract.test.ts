import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource (prefixed)",
  make: async () => ({
    source: new EnvSource({
      prefix: "APP_",
      env: { APP_SPIFFE_ENDPOINT_SOCKET: "unix:///tmp/agent.sock", HOME: "/root" },
    }),
  }),
  expected: { SPIFFE_ENDPOINT_SOCKET: "unix:///tmp/agent.sock" },
})
