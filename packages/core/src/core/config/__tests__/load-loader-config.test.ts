import { EnvSource } from "../../../adapters/config/env-source"
import { ObjectSource } from "../../../adapters/config/object-source"
import { InvalidConfigError } from "../../errors/errors"
import { ENV_PREFIX, loadLoaderConfig } from "../load-loader-config"

const env = (values: Record<string, string>) => new EnvSource({ prefix: ENV_PREFIX, env: values })

describe("loadLoaderConfig", () => {
  it("applies defaults", async () => {
    await expect(loadLoaderConfig({ sources: [env({})] })).resolves.toEqual({
      fetch: { timeoutMs: 15_000 },
      logging: { level: "info", prettify: false },
    })
  })

  it("reads prefixed environment variables", async () => {
    const config = await loadLoaderConfig({
      sources: [
        env({
          BATCHWEAVE_FETCH_TIMEOUT_MS: "250",
          BATCHWEAVE_MAX_CONCURRENCY: "4",
          BATCHWEAVE_LOG_LEVEL: "debug",
          BATCHWEAVE_LOG_PRETTY: "true",
          FETCH_TIMEOUT_MS: "1",
        }),
      ],
    })

    expect(config).toEqual({
      fetch: { timeoutMs: 250, maxConcurrency: 4 },
      logging: { level: "debug", prettify: true },
    })
  })

  it("lets later sources override earlier ones", async () => {
    const config = await loadLoaderConfig({
      sources: [
        env({ BATCHWEAVE_FETCH_TIMEOUT_MS: "250", BATCHWEAVE_LOG_LEVEL: "debug" }),
        new ObjectSource({ FETCH_TIMEOUT_MS: 1_000, LOG_PRETTY: true, LOG_LEVEL: undefined }),
      ],
    })

    expect(config).toEqual({
      fetch: { timeoutMs: 1_000 },
      logging: { level: "debug", prettify: true },
    })
  })

  it("rejects an unknown log level", async () => {
    const loading = loadLoaderConfig({ sources: [env({ BATCHWEAVE_LOG_LEVEL: "loud" })] })

    await expect(loading).rejects.toThrow(InvalidConfigError)
    await expect(loading).rejects.toThrow(/LOG_LEVEL/)
  })

  it("rejects a non-positive timeout", async () => {
    await expect(
      loadLoaderConfig({ sources: [env({ BATCHWEAVE_FETCH_TIMEOUT_MS: "0" })] }),
    ).rejects.toMatchObject({ code: "invalid_config" })
  })
})
