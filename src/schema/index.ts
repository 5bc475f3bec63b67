export type {
  ArrayNode,
  EnumLiteral,
  EnumNode,
  IntOrStringNode,
  ObjectNode,
  RefNode,
  ScalarNode,
  SchemaNode,
  SchemaNodeKind,
  SchemaProperty,
  UntypedNode,
} from "@/schema/types"
export type { RawCrd, RawCrdVersion, RawSchemaProps } from "@/schema/raw"
export { RawCrdSchema, RawCrdVersionSchema, RawSchemaPropsSchema } from "@/schema/raw"
export { toSchemaNode } from "@/schema/convert"
