/**
 * Tests for run metadata.
 */
import { Option, Schema } from "effect"
import { describe, expect, it } from "vitest"
import { RunMetadata, RunVariable } from "../../src/effect/models"

describe("RunMetadata", () => {
  it("defaults every field to unspecified", () => {
    const metadata = Schema.decodeUnknownSync(RunMetadata)({})

    expect(metadata.runId).toBe("")
    expect(metadata.platformName).toBe("")
    expect(metadata.usesEmulator).toBe(false)
    expect(metadata.regionName).toBe("")
    expect([...metadata.variableEntries()]).toEqual([])
  })

  it("exposes the stored fields", () => {
    const metadata = RunMetadata.make({
      runId: "run-123",
      platformName: "Console",
      usesEmulator: true,
      regionName: "PAL",
      variables: [
        RunVariable.make({ name: "Category", value: "Any%" }),
        RunVariable.make({ name: "Version", value: "1.0" }),
      ],
    })

    expect(metadata.runId).toBe("run-123")
    expect(metadata.platformName).toBe("Console")
    expect(metadata.usesEmulator).toBe(true)
    expect(metadata.regionName).toBe("PAL")
  })

  it("iterates variables in order", () => {
    const metadata = Schema.decodeUnknownSync(RunMetadata)({
      variables: [
        { name: "Category", value: "Any%" },
        { name: "Version", value: "1.0" },
      ],
    })

    expect([...metadata.variableEntries()]).toEqual([
      ["Category", "Any%"],
      ["Version", "1.0"],
    ])
  })

  it("looks up a variable by name", () => {
    const metadata = Schema.decodeUnknownSync(RunMetadata)({
      variables: [{ name: "Category", value: "Any%" }],
    })

    expect(metadata.variable("Category")).toEqual(Option.some("Any%"))
    expect(Option.isNone(metadata.variable("Region"))).toBe(true)
  })

  it("rejects malformed variables", () => {
    expect(() =>
      Schema.decodeUnknownSync(RunMetadata)({ variables: [{ name: "Category" }] })
    ).toThrow()
  })
})
