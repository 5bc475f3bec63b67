export {
  GENERATED_HEADER,
  KUBERNETES_MODULE,
  RESERVED_TYPE_NAMES,
  apiVersionOf,
  formatComment,
  renderGroupVersionInfo,
  renderResource,
  resourceModuleName,
  typeRefToTypescript,
} from "@/render/typescript"
export type { OutputFile, WriteOptions } from "@/render/output"
export { renderBatch, writeOutput } from "@/render/output"
