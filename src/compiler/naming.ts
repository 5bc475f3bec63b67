import { createHash } from "node:crypto"
import type { EnumLiteral } from "@/schema/types"

const WILDCARD_LITERAL = "*"
const WILDCARD_SUFFIX = "All"
const EMPTY_SUFFIX = "EmptyValue"

/**
 * Hex md5 digest of a string
 */
export const md5 = (input: string): string => createHash("md5").update(input).digest("hex")

/**
 * Convert a schema key to a type identifier.
 * Words are split on anything that is not a letter or digit; each word gets an upper-case
 * first character and keeps the rest of its casing (`apiVersion` -> `ApiVersion`,
 * `tls-config` -> `TlsConfig`, `URLs` -> `URLs`).
 */
export function toPascalCase(s: string): string {
  return s
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("")
}

/**
 * Name of the constant for one enum literal: the enum name followed by the PascalCased literal.
 * `"*"` and `""` get reserved suffixes so they still yield distinct, valid identifiers.
 */
export function enumConstantName(enumName: string, literal: EnumLiteral): string {
  const cleaned = typeof literal === "string" ? literal.replaceAll('"', "") : String(literal)
  if (cleaned === WILDCARD_LITERAL) return enumName + WILDCARD_SUFFIX
  if (cleaned === "") return enumName + EMPTY_SUFFIX
  return enumName + toPascalCase(cleaned)
}

/**
 * Where a generated type is being named
 */
export interface NamingContext {
  /** Kind of the resource being compiled */
  kind: string
  /** PascalCase field name */
  fieldName: string
  /** Property key as written in the schema; defaults to the field name */
  sourceKey?: string
  /** Dotted path of the struct that owns the field, starting at the kind */
  path: string
  /** The field belongs to the root struct, so the bare field name is not allowed */
  topLevel: boolean
}

/**
 * Candidate type names in order of preference:
 * 1. the bare field name (not for fields of the root struct)
 * 2. kind + field name
 * 3. ancestor path segments prepended innermost first
 * 4. field name with a digest of the owning path and the raw property key
 * 5. that name with a numeric suffix, counting up from 2
 *
 * The sequence is infinite, so a registry always finds a free name in it.
 */
export function* candidateNames(context: NamingContext): Generator<string> {
  const { kind, fieldName, path, topLevel, sourceKey = fieldName } = context

  if (!topLevel) {
    yield fieldName
  }
  yield kind + fieldName

  const segments = path.split(".")
  let prefix = ""
  for (let i = segments.length - 1; i >= 0; i--) {
    prefix = toPascalCase(segments[i] ?? "") + prefix
    yield prefix + fieldName
  }

  const hashed = `${fieldName}_${md5(`${path}.${sourceKey}`)}`
  yield hashed
  for (let i = 2; ; i++) {
    yield `${hashed}_${i}`
  }
}
