/**
 * Literal permitted by an `enum` clause
 */
export type EnumLiteral = string | number | boolean | null

interface NodeBase {
  description?: string
}

/**
 * A leaf with a primitive `type` (string, integer, number, boolean or anything unrecognised)
 */
export interface ScalarNode extends NodeBase {
  kind: "scalar"
  type: string
  format?: string
}

/**
 * A named property of an object schema
 */
export interface SchemaProperty {
  name: string
  schema: SchemaNode
}

export interface ObjectNode extends NodeBase {
  kind: "object"
  /** Sorted by name */
  properties: readonly SchemaProperty[]
  additionalProperties?: SchemaNode
  preserveUnknownFields: boolean
}

export interface ArrayNode extends NodeBase {
  kind: "array"
  items?: SchemaNode
}

/**
 * A `$ref`-only schema
 */
export interface RefNode extends NodeBase {
  kind: "ref"
  ref: string
}

/**
 * An untyped schema marked with `x-kubernetes-int-or-string`
 */
export interface IntOrStringNode extends NodeBase {
  kind: "int-or-string"
}

export interface EnumNode extends NodeBase {
  kind: "enum"
  type?: string
  format?: string
  literals: readonly EnumLiteral[]
}

export interface UntypedNode extends NodeBase {
  kind: "untyped"
}

/**
 * Normalised OpenAPI v3 schema node
 */
export type SchemaNode = ScalarNode | ObjectNode | ArrayNode | RefNode | IntOrStringNode | EnumNode | UntypedNode

export type SchemaNodeKind = SchemaNode["kind"]
