import { FakeClock } from "@tessera/clock"
import { MemoryLogger } from "@tessera/logger"
import { mock } from "vitest-mock-extended"
import { JsonConfigurationParser } from "../../../adapters/parsers/json-configuration-parser"
import { StaticContextProvider } from "../../../adapters/providers/static-context-provider"
import type { TaskScheduler } from "../../../ports/task-scheduler"
import { InMemoryContentLoader } from "../../../tests/utils/in-memory-content-loader"
import { checkoutPayload, toJson } from "../../../tests/utils/payloads"
import { ContextAggregator } from "../../context/context-aggregator"
import { ContextProviderRegistry } from "../../context/context-provider-registry"
import { DuplicateContextParameterError } from "../../errors"
import { ConditionsProcessor } from "../../evaluation/conditions-processor"
import { createConfiguration } from "../../model/configuration"
import { Snapshot } from "../../model/snapshot"
import { RemoteConfigurationRepository } from "../../repository/remote-configuration-repository"
import { ConfigurationResolver } from "../configuration-resolver"

const snapshot = Snapshot.fromConfigurations(
  [
    createConfiguration({
      alias: "flag.x",
      defaultValue: false,
      conditions: [{ match: { region: "EU" }, value: true }],
    }),
    createConfiguration({ alias: "search.limit", defaultValue: 10 }),
    createConfiguration({ alias: "pricing.rate", type: "float", defaultValue: 1 }),
  ],
  { version: 1, loadedAt: new Date(0) },
)

describe("ConfigurationResolver", () => {
  let logger: MemoryLogger
  let registry: ContextProviderRegistry
  let resolver: ConfigurationResolver

  beforeEach(() => {
    logger = new MemoryLogger()
    registry = new ContextProviderRegistry()
    resolver = new ConfigurationResolver({
      repository: snapshot,
      aggregator: new ContextAggregator(registry),
      processor: new ConditionsProcessor(),
      logger,
    })
  })

  describe("resolve", () => {
    it("evaluates conditions against per-call providers", () => {
      const result = resolver.resolve("flag.x", "boolean", [
        new StaticContextProvider({ region: "EU" }),
      ])

      expect(result).toEqual({
        kind: "resolved",
        value: true,
        configuration: snapshot.get("flag.x"),
      })
    })

    it("evaluates conditions against global providers", () => {
      registry.register(new StaticContextProvider({ region: "US" }))

      expect(resolver.resolve("flag.x", "boolean")).toMatchObject({
        kind: "resolved",
        value: false,
      })
    })

    it("returns not_found and warns for an unknown key", () => {
      expect(resolver.resolve("flag.unknown", "boolean")).toEqual({
        kind: "not_found",
        key: "flag.unknown",
      })
      expect(logger.entries).toEqual([
        {
          level: "warn",
          message: "Configuration not found",
          fields: { module: "configuration-resolver", alias: "flag.unknown" },
        },
      ])
    })

    it("returns type_mismatch and logs an error when the type differs", () => {
      expect(resolver.resolve("search.limit", "string")).toEqual({
        kind: "type_mismatch",
        key: "search.limit",
        expected: "string",
        actual: "integer",
      })
      expect(logger.at("error")).toEqual([
        {
          level: "error",
          message: "Configuration type mismatch",
          fields: {
            module: "configuration-resolver",
            alias: "search.limit",
            expectedType: "string",
            actualType: "integer",
          },
        },
      ])
    })

    it("distinguishes integer from float", () => {
      expect(resolver.resolve("pricing.rate", "integer").kind).toBe("type_mismatch")
      expect(resolver.resolve("pricing.rate", "float")).toMatchObject({
        kind: "resolved",
        value: 1,
      })
    })

    it("surfaces a duplicate context parameter", () => {
      registry.register(new StaticContextProvider({ region: "EU" }))

      const result = resolver.resolve("flag.x", "boolean", [
        new StaticContextProvider({ region: "US" }),
      ])

      expect(result.kind).toBe("duplicate_context_parameter")
      if (result.kind === "duplicate_context_parameter") {
        expect(result.key).toBe("flag.x")
        expect(result.error).toBeInstanceOf(DuplicateContextParameterError)
      }
    })

    it("does not aggregate context for an unknown key", () => {
      registry.register(new StaticContextProvider({ region: "EU" }))

      const result = resolver.resolve("flag.unknown", "boolean", [
        new StaticContextProvider({ region: "US" }),
      ])

      expect(result.kind).toBe("not_found")
    })
  })

  describe("get", () => {
    it("returns the resolved value", () => {
      expect(resolver.get("search.limit", "integer")).toBe(10)
    })

    it("returns undefined for unknown keys and mismatched types", () => {
      expect(resolver.get("flag.unknown", "boolean")).toBeUndefined()
      expect(resolver.get("search.limit", "boolean")).toBeUndefined()
    })

    it("throws on a duplicate context parameter", () => {
      expect(() =>
        resolver.get("flag.x", "boolean", [
          new StaticContextProvider({ region: "EU" }),
          new StaticContextProvider({ region: "US" }),
        ]),
      ).toThrow(DuplicateContextParameterError)
    })
  })

  describe("with a refreshing repository", () => {
    it("keeps resolving from the old snapshot while a refresh fails", async () => {
      const loader = new InMemoryContentLoader(toJson(checkoutPayload))
      const repository = await RemoteConfigurationRepository.create({
        loader,
        parser: new JsonConfigurationParser(),
        scheduler: mock<TaskScheduler>(),
        clock: new FakeClock(),
        logger,
      })
      const resolving = new ConfigurationResolver({
        repository,
        aggregator: new ContextAggregator(registry),
        processor: new ConditionsProcessor(),
        logger,
      })
      const eu = new StaticContextProvider({ region: "EU" })

      const before = resolving.get("checkout.expressEnabled", "boolean", [eu])
      const release = loader.hold()
      loader.failure = new Error("ECONNRESET")
      const refresh = repository.refresh()

      const during = resolving.get("checkout.expressEnabled", "boolean", [eu])

      release()
      const outcome = await refresh

      expect(outcome.kind).toBe("failed")
      expect(before).toBe(true)
      expect(during).toBe(true)
      expect(resolving.get("checkout.expressEnabled", "boolean", [eu])).toBe(true)
      expect(resolving.get("checkout.maxItems", "integer")).toBe(10)
    })
  })
})
