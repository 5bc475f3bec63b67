import type { CompiledBatch, EnumDef, ExternalType, StructDef, TypeModel, TypeRef } from "@/model/types"

/**
 * Call `visit` for a type reference and every reference nested inside it
 */
export function visitTypeRef(type: TypeRef, visit: (node: TypeRef) => void): void {
  visit(type)
  switch (type.kind) {
    case "array":
      visitTypeRef(type.items, visit)
      return
    case "map":
      visitTypeRef(type.values, visit)
      return
    case "optional":
      visitTypeRef(type.inner, visit)
      return
    default:
      return
  }
}

/**
 * Collect the names of generated (or `$ref`) types a reference points at
 */
export function collectTypeReferences(type: TypeRef, into: Set<string> = new Set<string>()): Set<string> {
  visitTypeRef(type, (node) => {
    if (node.kind === "named") into.add(node.name)
  })
  return into
}

/**
 * Collect the external types a reference needs
 */
export function collectExternalTypes(type: TypeRef, into: Set<ExternalType> = new Set<ExternalType>()): Set<ExternalType> {
  visitTypeRef(type, (node) => {
    if (node.kind === "external") into.add(node.name)
  })
  return into
}

/**
 * Direct dependencies of a struct: every named type its fields refer to
 */
export function structDependencies(struct: StructDef): Set<string> {
  const deps = new Set<string>()
  for (const field of struct.fields) {
    collectTypeReferences(field.type, deps)
  }
  return deps
}

/**
 * A named type of a batch and the resource model that defines it
 */
export type OwnedType =
  | { kind: "root"; owner: TypeModel; struct: StructDef }
  | { kind: "list"; owner: TypeModel }
  | { kind: "struct"; owner: TypeModel; struct: StructDef }
  | { kind: "enum"; owner: TypeModel; enumDef: EnumDef }

/**
 * Index every type defined by a batch by name
 */
export function indexBatchTypes(batch: CompiledBatch): Map<string, OwnedType> {
  const index = new Map<string, OwnedType>()
  for (const model of batch.resources) {
    index.set(model.root.name, { kind: "root", owner: model, struct: model.root })
    index.set(model.descriptor.listKind, { kind: "list", owner: model })
    for (const struct of model.structs.values()) {
      index.set(struct.name, { kind: "struct", owner: model, struct })
    }
    for (const enumDef of model.enums.values()) {
      index.set(enumDef.name, { kind: "enum", owner: model, enumDef })
    }
  }
  return index
}

/**
 * Find the resource model that defines a named type
 */
export function findTypeOwner(batch: CompiledBatch, name: string): TypeModel | undefined {
  return indexBatchTypes(batch).get(name)?.owner
}

/**
 * Recursively collect the given types and everything they depend on.
 * A root kind pulls in its list type, and a list type its root kind.
 * Names the batch does not define (dangling `$ref`s) are skipped.
 *
 * @param names - The type names to start from
 * @param batch - The compiled batch to look the types up in
 * @returns All reachable type names, in discovery order
 */
export function collectTypeDependencies(names: string[], batch: CompiledBatch): string[] {
  const index = indexBatchTypes(batch)
  const visited = new Set<string>()

  function collect(name: string) {
    if (visited.has(name)) return
    const entry = index.get(name)
    if (!entry) return
    visited.add(name)

    switch (entry.kind) {
      case "root":
        collect(entry.owner.descriptor.listKind)
        for (const dep of structDependencies(entry.struct)) collect(dep)
        return
      case "list":
        collect(entry.owner.root.name)
        return
      case "struct":
        for (const dep of structDependencies(entry.struct)) collect(dep)
        return
      case "enum":
        return
    }
  }

  for (const name of names) {
    collect(name)
  }

  return Array.from(visited)
}

/**
 * Create a batch containing only the given types and their dependencies.
 * A resource that defines any kept type is retained together with its root kind, so every
 * kept type still has a resource module to live in.
 */
export function subsetBatch(batch: CompiledBatch, names: string[]): CompiledBatch {
  const index = indexBatchTypes(batch)
  let wanted = [...names]
  let keep = new Set(collectTypeDependencies(wanted, batch))

  // Retaining a resource keeps its root, whose dependencies may live in further resources
  for (;;) {
    const roots = new Set<string>()
    for (const name of keep) {
      const owner = index.get(name)?.owner
      if (owner && !keep.has(owner.root.name)) roots.add(owner.root.name)
    }
    if (roots.size === 0) break
    wanted = [...wanted, ...roots]
    keep = new Set(collectTypeDependencies(wanted, batch))
  }

  const resources = batch.resources
    .filter((model) => keep.has(model.root.name))
    .map((model) => ({
      ...model,
      structs: new Map([...model.structs].filter(([name]) => keep.has(name))),
      enums: new Map([...model.enums].filter(([name]) => keep.has(name))),
    }))

  return { ...batch, resources, unresolvedRefs: [...batch.unresolvedRefs] }
}
