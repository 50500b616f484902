import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { SettingsSource } from "../source"

export type SettingsSourceHarness = {
  name: string
  /** Writes whatever files the source reads into `cwd`. */
  setup?: (cwd: string) => Promise<void>
  make: (cwd: string) => SettingsSource
  expected: Record<string, string>
}

export function describeSettingsSourceContract(h: SettingsSourceHarness) {
  describe(`${h.name} (SettingsSource contract)`, () => {
    let cwd: string
    let source: SettingsSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "settings-source-"))
      await h.setup?.(cwd)
      source = h.make(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty name", () => {
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to a plain object of strings", async () => {
      const result = await source.load()

      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
      for (const value of Object.values(result)) {
        expect(value === undefined || typeof value === "string").toBe(true)
      }
    })

    it("load() returns the expected values", async () => {
      expect(await source.load()).toMatchObject(h.expected)
    })

    it("load() hands out a fresh object each time", async () => {
      const first = await source.load()
      first.INJECTED_BY_TEST = "x"

      expect(await source.load()).not.toHaveProperty("INJECTED_BY_TEST")
    })
  })
}
