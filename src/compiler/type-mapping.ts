import type { ScalarType, TypeRef } from "@/model/types"

const scalar = (type: ScalarType): TypeRef => ({ kind: "scalar", scalar: type })

export const UNKNOWN: TypeRef = { kind: "unknown" }

/**
 * Formats that override the default for numeric types
 */
const NUMERIC_FORMATS: Record<string, ScalarType> = {
  int32: "int32",
  int64: "int64",
  float: "float32",
  double: "float64",
}

/**
 * Map a primitive schema type and format to a type reference.
 * Anything unrecognised becomes the opaque `unknown` placeholder.
 */
export function mapScalar(type: string | undefined, format?: string): TypeRef {
  switch (type) {
    case "string":
      if (format === "date-time") return { kind: "external", name: "Time" }
      if (format === "byte" || format === "binary") return scalar("bytes")
      return scalar("string")
    case "integer":
    case "number": {
      const formatted = format ? NUMERIC_FORMATS[format] : undefined
      if (formatted) return scalar(formatted)
      return scalar(type === "integer" ? "int64" : "float64")
    }
    case "boolean":
      return scalar("boolean")
    default:
      return UNKNOWN
  }
}
