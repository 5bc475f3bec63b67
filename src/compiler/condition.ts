import type { ObjectNode, SchemaNode } from "@/schema/types"

interface ExpectedProperty {
  type: string
  format?: string
  literals?: readonly string[]
}

const CONDITION_PROPERTIES: Record<string, ExpectedProperty> = {
  type: { type: "string" },
  status: { type: "string", literals: ["True", "False", "Unknown"] },
  reason: { type: "string" },
  message: { type: "string" },
  lastTransitionTime: { type: "string", format: "date-time" },
}

/**
 * Optional members of the upstream Condition type that may accompany the five required ones
 */
const CONDITION_OPTIONAL_PROPERTIES = new Set(["observedGeneration"])

function matches(node: SchemaNode, expected: ExpectedProperty): boolean {
  if (expected.literals) {
    if (node.kind !== "enum" || node.type !== expected.type) return false
    const literals = new Set(node.literals)
    return literals.size === expected.literals.length && expected.literals.every((literal) => literals.has(literal))
  }
  if (node.kind !== "scalar" || node.type !== expected.type) return false
  return expected.format === undefined || node.format === expected.format
}

/**
 * Whether an object schema is the conventional status condition record
 * (`type`, `status` of True/False/Unknown, `reason`, `message`, `lastTransitionTime`),
 * optionally with `observedGeneration`.
 */
export function isConditionShape(node: ObjectNode): boolean {
  const byName = new Map(node.properties.map((property) => [property.name, property.schema]))

  for (const [name, expected] of Object.entries(CONDITION_PROPERTIES)) {
    const property = byName.get(name)
    if (!property || !matches(property, expected)) return false
  }

  return node.properties.every((property) => Object.hasOwn(CONDITION_PROPERTIES, property.name) || CONDITION_OPTIONAL_PROPERTIES.has(property.name))
}
