import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  async function write(file: string, content: string) {
    await fs.writeFile(path.join(cwd, file), content)
  }

  it("is named after its file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false, cwd }).name).toBe(
      "dotenv:.env.local",
    )
  })

  it("parses key=value pairs, quotes and comments", async () => {
    await write(
      ".env",
      [
        "# workload endpoint",
        "SPIFFE_ENDPOINT_SOCKET='unix:///run/agent.sock'",
        'LOG_LEVEL="debug"',
        "X509_SOURCE_INIT_TIMEOUT_MS=3000",
      ].join("\n"),
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({
      SPIFFE_ENDPOINT_SOCKET: "unix:///run/agent.sock",
      LOG_LEVEL: "debug",
      X509_SOURCE_INIT_TIMEOUT_MS: "3000",
    })
  })

  it("returns an empty object when an optional file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects when a required file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("rejects on read errors other than a missing file, even when optional", async () => {
    await fs.mkdir(path.join(cwd, ".env"))

    const source = new DotenvSource({ file: ".env", required: false, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "EISDIR" })
  })

  it("resolves the path relative to cwd", async () => {
    const subdir = path.join(cwd, "deploy")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, ".env"), "LOG_PRETTY=true")

    const source = new DotenvSource({ file: ".env", required: true, cwd: subdir })

    expect(await source.load()).toEqual({ LOG_PRETTY: "true" })
  })
})
