import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("has the name 'env'", () => {
    expect(new EnvSource({ env: {} }).name).toBe("env")
  })

  it("returns all defined variables", async () => {
    const source = new EnvSource({
      env: { AWS_DEFAULT_REGION: "eu-west-1", LOG_LEVEL: "debug", UNSET: undefined },
    })

    expect(await source.load()).toEqual({
      AWS_DEFAULT_REGION: "eu-west-1",
      LOG_LEVEL: "debug",
    })
  })

  it("returns a copy", async () => {
    const env = { KEY: "value" }
    const loaded = await new EnvSource({ env }).load()

    loaded.KEY = "changed"

    expect(env.KEY).toBe("value")
  })
})
