import type { RawSchemaProps } from "@/schema/raw"
import type { SchemaNode, SchemaProperty } from "@/schema/types"

const PRESERVE_UNKNOWN_FIELDS = "x-kubernetes-preserve-unknown-fields"
const INT_OR_STRING = "x-kubernetes-int-or-string"

/**
 * Add the description to a node only when the raw schema carries one
 */
function withDescription(node: SchemaNode, raw: RawSchemaProps): SchemaNode {
  return raw.description ? { ...node, description: raw.description } : node
}

/**
 * Convert a validated raw schema into the closed SchemaNode variant.
 *
 * - no `type`: `$ref` wins over the int-or-string marker, anything else is untyped
 * - `object`: properties are sorted by key so later traversal never depends on source order
 * - `array`: a tuple-form `items` contributes its first entry
 * - any other type with a non-empty `enum` becomes an enum node
 */
export function toSchemaNode(raw: RawSchemaProps): SchemaNode {
  if (!raw.type) {
    if (raw.$ref) {
      return withDescription({ kind: "ref", ref: raw.$ref }, raw)
    }
    if (raw[INT_OR_STRING]) {
      return withDescription({ kind: "int-or-string" }, raw)
    }
    return withDescription({ kind: "untyped" }, raw)
  }

  if (raw.type === "object") {
    const properties: SchemaProperty[] = Object.keys(raw.properties ?? {})
      .sort()
      .flatMap((name) => {
        const child = raw.properties?.[name]
        return child ? [{ name, schema: toSchemaNode(child) }] : []
      })

    const additional = typeof raw.additionalProperties === "object" ? toSchemaNode(raw.additionalProperties) : undefined

    return withDescription(
      {
        kind: "object",
        properties,
        ...(additional ? { additionalProperties: additional } : {}),
        preserveUnknownFields: raw[PRESERVE_UNKNOWN_FIELDS] === true,
      },
      raw,
    )
  }

  if (raw.type === "array") {
    const items = Array.isArray(raw.items) ? raw.items[0] : raw.items
    return withDescription({ kind: "array", ...(items ? { items: toSchemaNode(items) } : {}) }, raw)
  }

  if (raw.enum && raw.enum.length > 0) {
    return withDescription(
      {
        kind: "enum",
        type: raw.type,
        ...(raw.format ? { format: raw.format } : {}),
        literals: [...raw.enum],
      },
      raw,
    )
  }

  return withDescription({ kind: "scalar", type: raw.type, ...(raw.format ? { format: raw.format } : {}) }, raw)
}
