import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

describe("loadConfig", () => {
  let cwd: string

  const schema = z.object({
    AWS_DEFAULT_REGION: z.string().default("us-east-1"),
    AWS_ACCESS_KEY_ID: z.string(),
  })

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-load-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("validates values from a single source", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { AWS_ACCESS_KEY_ID: "test-key" } })],
    })

    expect(config.value).toEqual({
      AWS_DEFAULT_REGION: "us-east-1",
      AWS_ACCESS_KEY_ID: "test-key",
    })
  })

  it("lets later sources override earlier ones", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "AWS_ACCESS_KEY_ID=from-file\nAWS_DEFAULT_REGION=eu-west-1",
    )

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { AWS_ACCESS_KEY_ID: "from-env" } }),
      ],
    })

    expect(config.get("AWS_ACCESS_KEY_ID")).toBe("from-env")
    expect(config.get("AWS_DEFAULT_REGION")).toBe("eu-west-1")
  })

  it("skips undefined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { AWS_ACCESS_KEY_ID: "first" } }),
        new EnvSource({ env: { AWS_ACCESS_KEY_ID: undefined } }),
      ],
    })

    expect(config.get("AWS_ACCESS_KEY_ID")).toBe("first")
  })

  it("strips keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { AWS_ACCESS_KEY_ID: "k", AWS_PROFLE: "typo" } })],
    })

    expect(config.value).toEqual({ AWS_DEFAULT_REGION: "us-east-1", AWS_ACCESS_KEY_ID: "k" })
  })

  it("throws ConfigError naming the invalid keys", async () => {
    const load = loadConfig({ schema, sources: [new EnvSource({ env: {} })] })

    await expect(load).rejects.toBeInstanceOf(ConfigError)
    await expect(load).rejects.toMatchObject({
      code: "config_invalid",
      context: { keys: ["AWS_ACCESS_KEY_ID"] },
    })
  })
})
