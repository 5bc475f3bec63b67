import type { EnumLiteral } from "@/schema/types"

export type ScalarType = "string" | "int32" | "int64" | "float32" | "float64" | "boolean" | "bytes"

/**
 * Types provided by the Kubernetes API machinery rather than generated
 */
export type ExternalType = "Time" | "Condition" | "ObjectMeta" | "ListMeta" | "IntOrString" | "RawExtension"

/**
 * Target-neutral reference to a type in the compiled model
 */
export type TypeRef =
  | { kind: "scalar"; scalar: ScalarType }
  | { kind: "external"; name: ExternalType }
  /** A generated struct or enum, or the name a `$ref` points at */
  | { kind: "named"; name: string; target: "struct" | "enum" | "ref" }
  | { kind: "array"; items: TypeRef }
  | { kind: "map"; values: TypeRef }
  /** Opaque value of any shape */
  | { kind: "unknown" }
  /** Only produced by the pointer pass */
  | { kind: "optional"; inner: TypeRef }

export interface FieldDef {
  /** PascalCase identifier derived from the source key */
  name: string
  /** Property key in the schema (the JSON name) */
  sourceKey: string
  type: TypeRef
  description?: string
  /** Name of the enum this field's type (or element type) refers to */
  enumRef?: string
}

export interface StructDef {
  name: string
  /** Sorted by field name */
  fields: FieldDef[]
  description: string
  root: boolean
  /** Dotted source path, starting at the kind */
  path: string
}

export interface EnumValue {
  /** Constant identifier */
  name: string
  value: EnumLiteral
}

export interface EnumDef {
  name: string
  /** Base type of the literals */
  type: TypeRef
  /** In declaration order */
  values: EnumValue[]
  description?: string
}

/**
 * Identity of a compiled resource
 */
export interface ResourceDescriptor {
  kind: string
  plural: string
  listKind: string
  group: string
  version: string
}

/**
 * Everything compiled for one resource. Structs and enums first created while compiling
 * another resource of the batch are referenced by name only and live in that resource's model.
 */
export interface TypeModel {
  descriptor: ResourceDescriptor
  root: StructDef
  structs: Map<string, StructDef>
  enums: Map<string, EnumDef>
  imports: Set<ExternalType>
  /** Names referenced through `$ref` */
  refs: Set<string>
  /** Whether the pointer pass has been applied */
  pointers: boolean
}

/**
 * Result of compiling resources that share one group and version
 */
export interface CompiledBatch {
  group: string
  version: string
  /** In submission order */
  resources: TypeModel[]
  /** `$ref` names that match no struct or enum of the batch, sorted */
  unresolvedRefs: string[]
}
