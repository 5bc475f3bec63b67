import type { StructDef, TypeModel, TypeRef } from "@/model/types"

const optional = (inner: TypeRef): TypeRef => (inner.kind === "optional" ? inner : { kind: "optional", inner })

/**
 * Optional form of a field type: collections stay as they are (an absent collection is
 * already representable) but hold optional elements; everything else becomes optional.
 */
export function toPointerType(type: TypeRef): TypeRef {
  switch (type.kind) {
    case "array":
      return { kind: "array", items: optional(type.items) }
    case "map":
      return { kind: "map", values: optional(type.values) }
    default:
      return optional(type)
  }
}

const pointerStruct = (struct: StructDef): StructDef => ({
  ...struct,
  fields: struct.fields.map((field) => ({ ...field, type: toPointerType(field.type) })),
})

/**
 * Apply the pointer conversion to every nested struct of a model. The root struct keeps
 * its `spec` and `status` fields as values. Applying it twice changes nothing.
 */
export function applyPointers(model: TypeModel): TypeModel {
  if (model.pointers) return model

  return {
    ...model,
    structs: new Map([...model.structs].map(([name, struct]) => [name, pointerStruct(struct)] as const)),
    pointers: true,
  }
}
