import { describe, it, expect } from "vitest"
import type { ObjectNode } from "@/schema/types"
import { toSchemaNode } from "@/schema/convert"
import type { RawSchemaProps } from "@/schema/raw"
import { condition, object, string } from "@/tests/helpers"
import { isConditionShape } from "@/compiler/condition"

const asObject = (raw: RawSchemaProps): ObjectNode => {
  const node = toSchemaNode(raw)
  if (node.kind !== "object") throw new Error(`expected an object node, got ${node.kind}`)
  return node
}

const conditionProperties = () => condition().properties ?? {}

describe("isConditionShape", () => {
  it("should match the standard condition", () => {
    expect(isConditionShape(asObject(condition()))).toBe(true)
  })

  it("should allow observedGeneration", () => {
    expect(isConditionShape(asObject(object({ ...conditionProperties(), observedGeneration: { type: "integer" } })))).toBe(true)
  })

  it("should not depend on the order of status literals", () => {
    expect(isConditionShape(asObject(object({ ...conditionProperties(), status: string({ enum: ["Unknown", "True", "False"] }) })))).toBe(true)
  })

  it("should reject a missing property", () => {
    const rest = Object.fromEntries(Object.entries(conditionProperties()).filter(([name]) => name !== "reason"))

    expect(isConditionShape(asObject(object(rest)))).toBe(false)
  })

  it("should reject extra properties", () => {
    expect(isConditionShape(asObject(object({ ...conditionProperties(), severity: string() })))).toBe(false)
  })

  it("should reject a status without the three literals", () => {
    expect(isConditionShape(asObject(object({ ...conditionProperties(), status: string({ enum: ["True", "False"] }) })))).toBe(false)
    expect(isConditionShape(asObject(object({ ...conditionProperties(), status: string() })))).toBe(false)
  })

  it("should reject a lastTransitionTime without the date-time format", () => {
    expect(isConditionShape(asObject(object({ ...conditionProperties(), lastTransitionTime: string() })))).toBe(false)
  })

  it("should reject wrongly typed properties", () => {
    expect(isConditionShape(asObject(object({ ...conditionProperties(), message: { type: "integer" } })))).toBe(false)
  })
})
