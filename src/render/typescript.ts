import { indexBatchTypes, type OwnedType, visitTypeRef } from "@/model/dependencies"
import type { CompiledBatch, EnumDef, ExternalType, FieldDef, StructDef, TypeModel, TypeRef } from "@/model/types"

export const GENERATED_HEADER = "// Code generated by crd-typegen. DO NOT EDIT.\n"

/**
 * Module providing the Kubernetes API machinery types
 */
export const KUBERNETES_MODULE = "@kubernetes/client-node"

/**
 * TypeScript spelling of each external type, and the name to import when it is not built in
 */
const EXTERNAL_TYPES: Record<ExternalType, { ts: string; importName?: string }> = {
  Time: { ts: "Date" },
  Condition: { ts: "V1Condition", importName: "V1Condition" },
  ObjectMeta: { ts: "V1ObjectMeta", importName: "V1ObjectMeta" },
  ListMeta: { ts: "V1ListMeta", importName: "V1ListMeta" },
  IntOrString: { ts: "IntOrString", importName: "IntOrString" },
  RawExtension: { ts: "Record<string, unknown>" },
}

/**
 * Generic the renderer spells maps with
 */
const MAP_TYPE = "Record"

const leadingIdentifier = (spelling: string) => /^[A-Za-z_$][\w$]*/.exec(spelling)?.[0]

/**
 * Identifiers rendered modules use without defining them. Generated types must not take
 * these names or they would shadow the global or imported type.
 */
export const RESERVED_TYPE_NAMES: ReadonlySet<string> = new Set(
  [MAP_TYPE, ...Object.values(EXTERNAL_TYPES).flatMap(({ ts, importName }) => [leadingIdentifier(ts), importName])].filter(
    (name): name is string => name !== undefined,
  ),
)

/**
 * Generate indentation spaces
 */
const space = (depth: number) => " ".repeat(depth)

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

/**
 * Quote a property key unless it is a valid identifier
 */
const propertyKey = (key: string) => (IDENTIFIER.test(key) ? key : JSON.stringify(key))

/**
 * apiVersion of a group/version pair; the core group has no prefix
 */
export const apiVersionOf = (group: string, version: string) => (group ? `${group}/${version}` : version)

/**
 * Module (without extension) holding the types of one resource
 */
export const resourceModuleName = (kind: string) => `types_${kind.toLowerCase()}`

/**
 * Convert a type reference to a TypeScript type expression
 */
export function typeRefToTypescript(type: TypeRef): string {
  switch (type.kind) {
    case "scalar":
      if (type.scalar === "boolean") return "boolean"
      if (type.scalar === "string" || type.scalar === "bytes") return "string"
      return "number"
    case "external":
      return EXTERNAL_TYPES[type.name].ts
    case "named":
      return type.name
    case "array": {
      const items = typeRefToTypescript(type.items)
      // Only wrap in parentheses if it's a compound type (union or intersection)
      const needsParens = items.includes(" | ") || items.includes(" & ")
      return needsParens ? `(${items})[]` : `${items}[]`
    }
    case "map":
      return `${MAP_TYPE}<string, ${typeRefToTypescript(type.values)}>`
    case "unknown":
      return "unknown"
    case "optional":
      return `${typeRefToTypescript(type.inner)} | null`
  }
}

/**
 * Format a description as line comments at the given indentation
 */
export function formatComment(description: string | undefined, depth: number): string {
  const text = description?.trim()
  if (!text) return ""
  return (
    text
      .split("\n")
      .map((line) => `${space(depth)}// ${line}`.trimEnd())
      .join("\n") + "\n"
  )
}

function renderField(field: FieldDef, depth: number): string {
  const optional = field.type.kind === "optional"
  const type = field.type.kind === "optional" ? field.type.inner : field.type
  return `${formatComment(field.description, depth)}${space(depth)}${propertyKey(field.sourceKey)}${optional ? "?" : ""}: ${typeRefToTypescript(type)}\n`
}

function renderStruct(struct: StructDef): string {
  const body = struct.fields.map((field) => renderField(field, 2)).join("")
  return `${formatComment(struct.description, 0)}export interface ${struct.name} {\n${body}}\n`
}

function renderRoot(model: TypeModel, apiVersion: string): string {
  const { root, descriptor } = model
  const identity =
    `${space(2)}apiVersion: ${JSON.stringify(apiVersion)}\n` +
    `${space(2)}kind: ${JSON.stringify(descriptor.kind)}\n` +
    `${space(2)}metadata?: ${EXTERNAL_TYPES.ObjectMeta.ts}\n`
  const body = root.fields.map((field) => renderField(field, 2)).join("")
  return `${formatComment(root.description, 0)}export interface ${root.name} {\n${identity}${body}}\n`
}

function renderList(model: TypeModel, apiVersion: string): string {
  const { kind, listKind } = model.descriptor
  return (
    `${formatComment(`${listKind} contains a list of ${kind}`, 0)}export interface ${listKind} {\n` +
    `${space(2)}apiVersion: ${JSON.stringify(apiVersion)}\n` +
    `${space(2)}kind: ${JSON.stringify(listKind)}\n` +
    `${space(2)}metadata?: ${EXTERNAL_TYPES.ListMeta.ts}\n` +
    `${space(2)}items: ${kind}[]\n` +
    `}\n`
  )
}

function renderEnum(enumDef: EnumDef): string {
  const union = enumDef.values.map((value) => JSON.stringify(value.value)).join(" | ") || "never"
  const constants = enumDef.values.map((value) => `export const ${value.name}: ${enumDef.name} = ${JSON.stringify(value.value)}\n`).join("")
  return `${formatComment(enumDef.description, 0)}export type ${enumDef.name} = ${union}\n\n${constants}`
}

/**
 * Everything a resource module refers to that it does not define itself
 */
interface ModuleReferences {
  kubernetes: Set<string>
  /** Module name -> type names imported from it */
  siblings: Map<string, Set<string>>
  unresolved: Set<string>
}

function collectModuleReferences(model: TypeModel, index: Map<string, OwnedType>): ModuleReferences {
  const refs: ModuleReferences = { kubernetes: new Set(), siblings: new Map(), unresolved: new Set() }
  const types: TypeRef[] = [
    { kind: "external", name: "ObjectMeta" },
    { kind: "external", name: "ListMeta" },
    ...[model.root, ...model.structs.values()].flatMap((struct) => struct.fields.map((field) => field.type)),
    ...[...model.enums.values()].map((enumDef) => enumDef.type),
  ]

  for (const type of types) {
    visitTypeRef(type, (node) => {
      if (node.kind === "external") {
        const importName = EXTERNAL_TYPES[node.name].importName
        if (importName) refs.kubernetes.add(importName)
        return
      }
      if (node.kind !== "named") return

      const owned = index.get(node.name)
      if (!owned) {
        refs.unresolved.add(node.name)
        return
      }
      if (owned.owner === model) return

      const moduleName = resourceModuleName(owned.owner.descriptor.kind)
      const names = refs.siblings.get(moduleName) ?? new Set<string>()
      names.add(node.name)
      refs.siblings.set(moduleName, names)
    })
  }

  return refs
}

const sorted = (values: Iterable<string>) => [...values].sort()

function renderImports(refs: ModuleReferences): string {
  let result = ""
  if (refs.kubernetes.size > 0) {
    result += `import type { ${sorted(refs.kubernetes).join(", ")} } from "${KUBERNETES_MODULE}"\n`
  }
  for (const moduleName of sorted(refs.siblings.keys())) {
    result += `import type { ${sorted(refs.siblings.get(moduleName) ?? []).join(", ")} } from "./${moduleName}"\n`
  }
  return result
}

/**
 * Render the TypeScript module for one resource of a batch: the root and list interfaces,
 * then every struct and enum the resource defines, each sorted by name. Types defined by other
 * resources of the batch are imported from their modules; `$ref` names the batch does not define
 * become local `unknown` aliases.
 */
export function renderResource(model: TypeModel, batch: CompiledBatch): string {
  const index = indexBatchTypes(batch)
  const refs = collectModuleReferences(model, index)
  const apiVersion = apiVersionOf(batch.group, batch.version)

  const sections: string[] = [GENERATED_HEADER]

  const imports = renderImports(refs)
  if (imports) sections.push(imports)

  for (const name of sorted(refs.unresolved)) {
    sections.push(`// ${name} is referenced by $ref but not generated in this batch\ntype ${name} = unknown\n`)
  }

  sections.push(renderRoot(model, apiVersion), renderList(model, apiVersion))

  for (const name of sorted(model.structs.keys())) {
    const struct = model.structs.get(name)
    if (struct) sections.push(renderStruct(struct))
  }
  for (const name of sorted(model.enums.keys())) {
    const enumDef = model.enums.get(name)
    if (enumDef) sections.push(renderEnum(enumDef))
  }

  return sections.join("\n")
}

/**
 * Render the group/version module shared by all resources of a batch
 */
export function renderGroupVersionInfo(batch: CompiledBatch): string {
  const kinds = batch.resources.flatMap((model) => [model.descriptor.kind, model.descriptor.listKind])
  const kindEntries = kinds.map((kind) => `${space(2)}${propertyKey(kind)}: ${JSON.stringify(kind)},\n`).join("")
  const pluralEntries = batch.resources
    .map((model) => `${space(2)}${propertyKey(model.descriptor.kind)}: ${JSON.stringify(model.descriptor.plural)},\n`)
    .join("")

  return [
    GENERATED_HEADER,
    `// GroupVersion is the group and version of the resources in this package\n` +
      `export const GroupVersion = { group: ${JSON.stringify(batch.group)}, version: ${JSON.stringify(batch.version)} } as const\n`,
    `// ApiVersion is the apiVersion of the resources in this package\nexport const ApiVersion = ${JSON.stringify(apiVersionOf(batch.group, batch.version))}\n`,
    `// Kinds lists every kind and list kind in this package\nexport const Kinds = {\n${kindEntries}} as const\n`,
    `// Plurals maps each kind to its resource name\nexport const Plurals = {\n${pluralEntries}} as const\n`,
  ].join("\n")
}
