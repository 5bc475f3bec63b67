import { ConsistencyError, SchemaError } from "@/errors"
import { isConditionShape } from "@/compiler/condition"
import { candidateNames, enumConstantName, toPascalCase } from "@/compiler/naming"
import { applyPointers } from "@/compiler/pointers"
import { NamingRegistry } from "@/compiler/registry"
import { canonicalJson, enumSignature, structSignature } from "@/compiler/signature"
import { UNKNOWN, mapScalar } from "@/compiler/type-mapping"
import { selectVersion } from "@/loader/parse"
import type { CrdDocument } from "@/loader/types"
import { collectExternalTypes, indexBatchTypes } from "@/model/dependencies"
import { RESERVED_TYPE_NAMES } from "@/render/typescript"
import type { CompiledBatch, EnumDef, EnumValue, ExternalType, FieldDef, ResourceDescriptor, StructDef, TypeModel, TypeRef } from "@/model/types"
import type { EnumNode, ObjectNode, SchemaNode, SchemaProperty } from "@/schema/types"

/**
 * The only top-level properties compiled into the root struct
 */
const ROOT_FIELDS = new Set(["spec", "status"])

export interface CompileOptions {
  /** Version every resource must expose. Defaults to each resource's storage version. */
  version?: string
  /** Rewrite field types of nested structs to their optional form */
  pointers?: boolean
}

/**
 * Where a field sits while its type is being resolved
 */
interface FieldContext {
  /** Property key */
  propName: string
  /** PascalCase field name */
  fieldName: string
  /** Path of the owning struct */
  path: string
  /** The owning struct is the root */
  topLevel: boolean
}

/**
 * Find the enum a field type refers to, directly or as an element type
 */
function enumTarget(type: TypeRef): string | undefined {
  switch (type.kind) {
    case "named":
      return type.target === "enum" ? type.name : undefined
    case "array":
      return enumTarget(type.items)
    case "map":
      return enumTarget(type.values)
    case "optional":
      return enumTarget(type.inner)
    default:
      return undefined
  }
}

/**
 * Compiles the schema of one resource against a registry shared with the rest of its batch
 */
class ResourceCompiler {
  private readonly structs = new Map<string, StructDef>()
  private readonly enums = new Map<string, EnumDef>()
  private readonly refs = new Set<string>()

  constructor(
    private readonly registry: NamingRegistry,
    private readonly descriptor: ResourceDescriptor,
  ) {}

  compile(schema: SchemaNode): TypeModel {
    const { kind } = this.descriptor
    if (schema.kind !== "object") {
      throw new SchemaError({ kind, message: `openAPIV3Schema must be an object, got ${schema.kind}` })
    }

    const root = this.buildStruct(schema, kind, kind, true)

    const imports = new Set<ExternalType>(["ObjectMeta", "ListMeta"])
    for (const struct of [root, ...this.structs.values()]) {
      for (const field of struct.fields) collectExternalTypes(field.type, imports)
    }
    for (const enumDef of this.enums.values()) {
      collectExternalTypes(enumDef.type, imports)
    }

    return {
      descriptor: this.descriptor,
      root,
      structs: this.structs,
      enums: this.enums,
      imports,
      refs: this.refs,
      pointers: false,
    }
  }

  private buildStruct(node: ObjectNode, name: string, path: string, root: boolean): StructDef {
    const fields: FieldDef[] = []
    for (const property of node.properties) {
      if (root && !ROOT_FIELDS.has(property.name)) continue
      fields.push(this.buildField(property, path, root))
    }
    fields.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    const fallback = root ? `${name} is the Schema for the ${this.descriptor.plural} API` : `${name} represents ${path}`
    return { name, fields, description: node.description ?? fallback, root, path }
  }

  private buildField(property: SchemaProperty, path: string, topLevel: boolean): FieldDef {
    const fieldName = toPascalCase(property.name)
    const type = this.resolve(property.schema, { propName: property.name, fieldName, path, topLevel })
    const enumRef = enumTarget(type)

    return {
      name: fieldName,
      sourceKey: property.name,
      type,
      ...(property.schema.description ? { description: property.schema.description } : {}),
      ...(enumRef ? { enumRef } : {}),
    }
  }

  /**
   * Map a schema node to a type reference, generating structs and enums on the way
   */
  private resolve(node: SchemaNode, context: FieldContext): TypeRef {
    switch (node.kind) {
      case "scalar":
        return mapScalar(node.type, node.format)
      case "enum":
        return this.enumType(node, context)
      case "object":
        return this.objectType(node, context)
      case "array":
        return { kind: "array", items: node.items ? this.resolve(node.items, context) : UNKNOWN }
      case "ref": {
        const segments = node.ref.split("/")
        const name = toPascalCase(segments[segments.length - 1] ?? "")
        this.refs.add(name)
        return { kind: "named", name, target: "ref" }
      }
      case "int-or-string":
        return { kind: "external", name: "IntOrString" }
      case "untyped":
        return UNKNOWN
      default: {
        const unreachable: never = node
        return unreachable
      }
    }
  }

  private objectType(node: ObjectNode, context: FieldContext): TypeRef {
    if (isConditionShape(node)) {
      return { kind: "external", name: "Condition" }
    }
    if (node.properties.length > 0) {
      return this.structType(node, context)
    }
    if (node.additionalProperties) {
      return { kind: "map", values: this.resolve(node.additionalProperties, context) }
    }
    if (context.propName === "metadata") {
      return { kind: "external", name: "ObjectMeta" }
    }
    if (node.preserveUnknownFields) {
      return { kind: "external", name: "RawExtension" }
    }
    return { kind: "map", values: UNKNOWN }
  }

  private candidates(context: FieldContext, topLevel: boolean): Iterable<string> {
    const { fieldName, propName, path } = context
    return candidateNames({ kind: this.descriptor.kind, fieldName, sourceKey: propName, path, topLevel })
  }

  private structType(node: ObjectNode, context: FieldContext): TypeRef {
    const { name, isNew } = this.registry.getOrAssign(structSignature(node), this.candidates(context, context.topLevel))
    if (isNew) {
      this.structs.set(name, this.buildStruct(node, name, `${context.path}.${context.propName}`, false))
    }
    return { kind: "named", name, target: "struct" }
  }

  private enumType(node: EnumNode, context: FieldContext): TypeRef {
    const { name, isNew } = this.registry.getOrAssign(enumSignature(node.literals), this.candidates(context, false))
    if (isNew) {
      this.enums.set(name, {
        name,
        type: mapScalar(node.type, node.format),
        values: enumValues(name, node),
        ...(node.description ? { description: node.description } : {}),
      })
    }
    return { kind: "named", name, target: "enum" }
  }
}

/**
 * One constant per distinct literal, in declaration order.
 * Literals that clean up to the same identifier get a numeric suffix.
 */
function enumValues(enumName: string, node: EnumNode): EnumValue[] {
  const seenLiterals = new Set<string>()
  const usedNames = new Set<string>()
  const values: EnumValue[] = []

  for (const literal of node.literals) {
    const key = canonicalJson(literal)
    if (seenLiterals.has(key)) continue
    seenLiterals.add(key)

    const base = enumConstantName(enumName, literal)
    let name = base
    for (let i = 2; usedNames.has(name); i++) {
      name = `${base}${i}`
    }
    usedNames.add(name)
    values.push({ name, value: literal })
  }

  return values
}

/**
 * Take the kind and list kind of every resource, then the names rendered modules use
 * without defining them
 */
function reserveTypeNames(registry: NamingRegistry, docs: CrdDocument[]): void {
  for (const doc of docs) {
    for (const name of [doc.kind, doc.listKind]) {
      if (RESERVED_TYPE_NAMES.has(name)) {
        throw new SchemaError({ kind: doc.kind, source: doc.source, message: `type name "${name}" is reserved by the generated code` })
      }
      if (!registry.reserve(name)) {
        throw new SchemaError({ kind: doc.kind, source: doc.source, message: `type name "${name}" is defined by more than one CRD in the batch` })
      }
    }
  }
  for (const name of RESERVED_TYPE_NAMES) {
    registry.reserve(name)
  }
}

/**
 * Compile a resource's root schema into a type model.
 * Pure apart from the registry, which records every struct and enum name assigned.
 */
export function compileSchema(schema: SchemaNode, descriptor: ResourceDescriptor, registry: NamingRegistry): TypeModel {
  return new ResourceCompiler(registry, descriptor).compile(schema)
}

/**
 * Select the version of a CRD and compile it.
 *
 * @param doc - The loaded CRD
 * @param options - Desired version and pointer output
 * @param registry - Registry shared with the rest of the batch; a fresh one when omitted
 */
export function compileResource(doc: CrdDocument, options: CompileOptions = {}, registry?: NamingRegistry): TypeModel {
  const version = selectVersion(doc, options.version)
  if (!version) {
    const criterion = options.version ? `version "${options.version}" not found` : "no storage version"
    throw new SchemaError({ kind: doc.kind, source: doc.source, message: `${criterion} (available: ${doc.versions.map((v) => v.name).join(", ")})` })
  }
  if (!version.schema) {
    throw new SchemaError({ kind: doc.kind, source: doc.source, message: `version "${version.name}" has no openAPIV3Schema` })
  }

  let shared = registry
  if (!shared) {
    shared = new NamingRegistry()
    reserveTypeNames(shared, [doc])
  }

  const model = compileSchema(
    version.schema,
    { kind: doc.kind, plural: doc.plural, listKind: doc.listKind, group: doc.group, version: version.name },
    shared,
  )
  return options.pointers ? applyPointers(model) : model
}

/**
 * Compile several CRDs of one API group and version into a single batch.
 *
 * Resources compile strictly in the given order against one registry, so the order decides
 * which resource gets the shorter name when shapes differ and which resource defines a
 * shared type. Kinds, list kinds and the names in RESERVED_TYPE_NAMES are reserved up front.
 */
export function compileBatch(docs: CrdDocument[], options: CompileOptions = {}): CompiledBatch {
  const [head] = docs
  if (!head) {
    throw new SchemaError({ message: "at least one CRD must be given" })
  }

  const registry = new NamingRegistry()
  reserveTypeNames(registry, docs)

  const resources: TypeModel[] = []
  for (const doc of docs) {
    const first = resources[0]?.descriptor

    if (first && doc.group !== first.group) {
      throw new ConsistencyError({ field: "group", first: { kind: first.kind, value: first.group }, second: { kind: doc.kind, value: doc.group } })
    }

    if (first) {
      const selected = selectVersion(doc, options.version)
      if (!selected || selected.name !== first.version) {
        const value = selected?.name ?? doc.versions.map((v) => v.name).join(", ")
        throw new ConsistencyError({ field: "version", first: { kind: first.kind, value: first.version }, second: { kind: doc.kind, value } })
      }
    }

    resources.push(compileResource(doc, options, registry))
  }

  const defined = indexBatchTypes({ group: head.group, version: "", resources, unresolvedRefs: [] })
  const unresolved = new Set<string>()
  for (const model of resources) {
    for (const ref of model.refs) {
      if (!defined.has(ref)) unresolved.add(ref)
    }
  }

  return {
    group: head.group,
    version: resources[0]?.descriptor.version ?? "",
    resources,
    unresolvedRefs: [...unresolved].sort(),
  }
}
