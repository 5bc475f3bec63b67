import { describe, it, expect } from "vitest"
import type { TypeRef } from "@/model/types"
import { mapScalar } from "@/compiler/type-mapping"

describe("mapScalar", () => {
  it.each<[string | undefined, string | undefined, TypeRef]>([
    ["string", undefined, { kind: "scalar", scalar: "string" }],
    ["string", "date-time", { kind: "external", name: "Time" }],
    ["string", "byte", { kind: "scalar", scalar: "bytes" }],
    ["string", "binary", { kind: "scalar", scalar: "bytes" }],
    ["string", "email", { kind: "scalar", scalar: "string" }],
    ["integer", undefined, { kind: "scalar", scalar: "int64" }],
    ["integer", "int32", { kind: "scalar", scalar: "int32" }],
    ["integer", "int64", { kind: "scalar", scalar: "int64" }],
    ["number", undefined, { kind: "scalar", scalar: "float64" }],
    ["number", "float", { kind: "scalar", scalar: "float32" }],
    ["number", "double", { kind: "scalar", scalar: "float64" }],
    ["number", "int32", { kind: "scalar", scalar: "int32" }],
    ["boolean", undefined, { kind: "scalar", scalar: "boolean" }],
    ["null", undefined, { kind: "unknown" }],
    [undefined, undefined, { kind: "unknown" }],
  ])("should map type %s with format %s", (type, format, expected) => {
    expect(mapScalar(type, format)).toEqual(expected)
  })
})
