export type { CrdDocument, CrdVersion, LoadOptions } from "@/loader/types"
export { parseCrd, selectVersion } from "@/loader/parse"
export { readCrd, loadCrds } from "@/loader/read"
