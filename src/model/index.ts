export type {
  CompiledBatch,
  EnumDef,
  EnumValue,
  ExternalType,
  FieldDef,
  ResourceDescriptor,
  ScalarType,
  StructDef,
  TypeModel,
  TypeRef,
} from "@/model/types"
export type { OwnedType } from "@/model/dependencies"
export {
  collectExternalTypes,
  collectTypeDependencies,
  collectTypeReferences,
  findTypeOwner,
  indexBatchTypes,
  structDependencies,
  subsetBatch,
  visitTypeRef,
} from "@/model/dependencies"
