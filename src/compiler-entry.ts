/**
 * crd-typegen/compiler
 *
 * The schema-to-type-model compiler alone, without loading or rendering.
 *
 * @example
 * ```ts
 * import { compileSchema, NamingRegistry } from "crd-typegen/compiler"
 *
 * const model = compileSchema(schema, { kind: "Widget", plural: "widgets", listKind: "WidgetList", group: "example.com", version: "v1" }, new NamingRegistry())
 * ```
 */

export * from "@/compiler"
export * from "@/model"
export type { SchemaNode, SchemaProperty } from "@/schema/types"
