import { md5 } from "@/compiler/naming"
import type { EnumLiteral, ObjectNode } from "@/schema/types"

/**
 * JSON serialisation with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`
  }
  return JSON.stringify(value)
}

/**
 * Signature of an object schema, computed over its property set
 */
export function structSignature(node: ObjectNode): string {
  const properties = Object.fromEntries(node.properties.map((property) => [property.name, property.schema]))
  return md5(`struct:${canonicalJson(properties)}`)
}

/**
 * Signature of an enum, computed over its literal set (order-insensitive)
 */
export function enumSignature(literals: readonly EnumLiteral[]): string {
  const values = [...new Set(literals.map((literal) => canonicalJson(literal)))].sort()
  return md5(`enum:${values.join(",")}`)
}
