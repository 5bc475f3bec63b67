export type { CompileOptions } from "@/compiler/compiler"
export { compileBatch, compileResource, compileSchema } from "@/compiler/compiler"
export type { AssignedName } from "@/compiler/registry"
export { NamingRegistry } from "@/compiler/registry"
export type { NamingContext } from "@/compiler/naming"
export { candidateNames, enumConstantName, toPascalCase } from "@/compiler/naming"
export { canonicalJson, enumSignature, structSignature } from "@/compiler/signature"
export { mapScalar } from "@/compiler/type-mapping"
export { isConditionShape } from "@/compiler/condition"
export { applyPointers, toPointerType } from "@/compiler/pointers"
