/**
 * crd-typegen
 *
 * Compiles the OpenAPI v3 schemas of Kubernetes CustomResourceDefinitions into a normalized,
 * deduplicated type model and renders it as TypeScript declarations.
 *
 * @example
 * ```ts
 * import { loadCrds, compileBatch, renderBatch } from "crd-typegen"
 *
 * const docs = await loadCrds(["crds/widgets.yaml", "crds/gadgets.yaml"])
 * const batch = compileBatch(docs, { pointers: true })
 *
 * for (const file of renderBatch(batch)) {
 *   console.log(file.path)
 * }
 * // v1/types_widget.ts
 * // v1/types_gadget.ts
 * // v1/group_version_info.ts
 * ```
 */

// Errors
export { CrdGenError, InputError, SchemaError, ConsistencyError } from "./errors"
export type { ConsistencySide } from "./errors"
export type { Logger } from "./logger"

// Schema
export * from "./schema"

// Loading
export * from "./loader"

// Compiling
export * from "./compiler"

// Type model
export * from "./model"

// Rendering
export * from "./render"
