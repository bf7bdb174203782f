import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { mock } from "vitest-mock-extended"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { JsonSource } from "../../adapters/json/json-source"
import { ObjectSource } from "../../adapters/object/object-source"
import type { ConfigSource } from "../../ports/source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

describe("loadConfig e2e", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-e2e-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  const schema = z.object({
    TIMEOUT_MS: z.coerce.number(),
    DOMAIN: z.string(),
  })

  describe("single source", () => {
    it("loads from env source", async () => {
      const config = await loadConfig({
        schema,
        sources: [new EnvSource({ env: { TIMEOUT_MS: "500", DOMAIN: "files" } })],
      })

      expect(config.get("TIMEOUT_MS")).toBe(500)
      expect(config.get("DOMAIN")).toBe("files")
    })

    it("loads from dotenv source", async () => {
      await fs.writeFile(path.join(cwd, ".env"), "TIMEOUT_MS=500\nDOMAIN=files")

      const config = await loadConfig({
        schema,
        sources: [new DotenvSource({ file: ".env", required: true, cwd })],
      })

      expect(config.value).toEqual({ TIMEOUT_MS: 500, DOMAIN: "files" })
    })

    it("loads from json source", async () => {
      await fs.writeFile(
        path.join(cwd, "plugin.json"),
        JSON.stringify({ TIMEOUT_MS: 500, DOMAIN: "files" }),
      )

      const config = await loadConfig({
        schema,
        sources: [new JsonSource({ file: "plugin.json", required: true, cwd })],
      })

      expect(config.value).toEqual({ TIMEOUT_MS: 500, DOMAIN: "files" })
    })

    it("defaults to the process environment", async () => {
      vi.stubEnv("PLUGKIT_TEST_DOMAIN", "from-process")

      const config = await loadConfig({
        schema: z.object({ PLUGKIT_TEST_DOMAIN: z.string() }),
      })

      expect(config.get("PLUGKIT_TEST_DOMAIN")).toBe("from-process")
      expect(config.explain("PLUGKIT_TEST_DOMAIN")).toBe("env")

      vi.unstubAllEnvs()
    })
  })

  describe("precedence", () => {
    it("json < dotenv < env < flags", async () => {
      await fs.writeFile(
        path.join(cwd, "plugin.json"),
        JSON.stringify({ A: "json", B: "json", C: "json", D: "json" }),
      )
      await fs.writeFile(path.join(cwd, ".env"), "B=dotenv\nC=dotenv\nD=dotenv")

      const config = await loadConfig({
        schema: z.object({ A: z.string(), B: z.string(), C: z.string(), D: z.string() }),
        sources: [
          new JsonSource({ file: "plugin.json", required: true, cwd }),
          new DotenvSource({ file: ".env", required: true, cwd }),
          new EnvSource({ env: { C: "env", D: "env" } }),
          new ObjectSource({ D: "flag" }, "flags"),
        ],
      })

      expect(config.value).toEqual({ A: "json", B: "dotenv", C: "env", D: "flag" })
      expect(config.explain("D")).toBe("object:flags")
    })

    it("skips missing optional files", async () => {
      const config = await loadConfig({
        schema,
        sources: [
          new DotenvSource({ file: ".env.missing", required: false, cwd }),
          new JsonSource({ file: "missing.json", required: false, cwd }),
          new EnvSource({ env: { TIMEOUT_MS: "1", DOMAIN: "d" } }),
        ],
      })

      expect(config.get("TIMEOUT_MS")).toBe(1)
    })

    it("undefined values do not override defined values", async () => {
      await fs.writeFile(path.join(cwd, ".env"), "TIMEOUT_MS=300\nDOMAIN=files")

      const config = await loadConfig({
        schema,
        sources: [
          new DotenvSource({ file: ".env", required: true, cwd }),
          new EnvSource({ env: { TIMEOUT_MS: undefined } }),
        ],
      })

      expect(config.get("TIMEOUT_MS")).toBe(300)
      expect(config.explain("TIMEOUT_MS")).toBe("dotenv:.env")
    })
  })

  describe("schema validation", () => {
    it("applies defaults and reports them as such", async () => {
      const config = await loadConfig({
        schema: z.object({ TIMEOUT_MS: z.coerce.number().default(5000) }),
        sources: [new EnvSource({ env: {} })],
      })

      expect(config.get("TIMEOUT_MS")).toBe(5000)
      expect(config.explain("TIMEOUT_MS")).toBe("default")
      expect(config.sourcesUsed()).toEqual(["default"])
    })

    it("throws config_invalid naming the failing keys", async () => {
      const load = loadConfig({
        schema,
        sources: [new EnvSource({ env: { TIMEOUT_MS: "soon" } })],
      })

      await expect(load).rejects.toBeInstanceOf(ConfigError)
      await expect(load).rejects.toMatchObject({
        code: "config_invalid",
        context: { keys: ["TIMEOUT_MS", "DOMAIN"] },
      })
      await expect(load).rejects.toThrow("Configuration validation failed")
    })

    it("reports extras", async () => {
      const config = await loadConfig({
        schema,
        sources: [new EnvSource({ env: { TIMEOUT_MS: "1", DOMAIN: "d", DOMIAN: "typo" } })],
      })

      expect(config.extras()).toEqual(["DOMIAN"])
    })
  })

  describe("source failures", () => {
    it("loads each source once, in order", async () => {
      const first = mock<ConfigSource>({ name: "first" })
      const second = mock<ConfigSource>({ name: "second" })
      first.load.mockResolvedValue({ DOMAIN: "files" })
      second.load.mockResolvedValue({ DOMAIN: "links" })

      const config = await loadConfig({
        schema: z.object({ DOMAIN: z.string() }),
        sources: [first, second],
      })

      expect(first.load).toHaveBeenCalledTimes(1)
      expect(second.load).toHaveBeenCalledTimes(1)
      expect(first.load.mock.invocationCallOrder[0]).toBeLessThan(
        second.load.mock.invocationCallOrder[0] ?? 0,
      )
      expect(config.get("DOMAIN")).toBe("links")
    })

    it("wraps a failing source in config_source_failed", async () => {
      const cause = new Error("permission denied")
      const broken: ConfigSource = {
        name: "broken",
        load: async () => {
          throw cause
        },
      }

      const load = loadConfig({ schema, sources: [broken] })

      await expect(load).rejects.toMatchObject({
        code: "config_source_failed",
        context: { source: "broken" },
        cause,
      })
    })

    it("wraps a required file that is missing", async () => {
      await expect(
        loadConfig({ schema, sources: [new JsonSource({ file: "plugin.json", required: true, cwd })] }),
      ).rejects.toMatchObject({ code: "config_source_failed" })
    })
  })

  describe("expandEnv", () => {
    it("expands references to other merged values", async () => {
      const config = await loadConfig({
        schema: z.object({ HOME_DIR: z.string(), CACHE_DIR: z.string(), LOG_FILE: z.string() }),
        sources: [
          new EnvSource({
            env: {
              HOME_DIR: "/home/test",
              CACHE_DIR: "${HOME_DIR}/.cache",
              LOG_FILE: "${CACHE_DIR}/${MISSING}plugin.log",
            },
          }),
        ],
        expandEnv: true,
      })

      expect(config.get("CACHE_DIR")).toBe("/home/test/.cache")
      expect(config.get("LOG_FILE")).toBe("${HOME_DIR}/.cache/plugin.log")
    })

    it("expands non-string references and leaves non-strings alone", async () => {
      const config = await loadConfig({
        schema: z.object({ PORT: z.number(), URL: z.string() }),
        sources: [new ObjectSource({ PORT: 4000, URL: "http://localhost:${PORT}" })],
        expandEnv: true,
      })

      expect(config.value).toEqual({ PORT: 4000, URL: "http://localhost:4000" })
    })

    it("is off by default", async () => {
      const config = await loadConfig({
        schema: z.object({ A: z.string(), B: z.string() }),
        sources: [new EnvSource({ env: { A: "x", B: "${A}" } })],
      })

      expect(config.get("B")).toBe("${A}")
    })
  })
})
