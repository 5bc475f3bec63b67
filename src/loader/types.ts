import type { SchemaNode } from "@/schema/types"

/**
 * One served version of a CRD together with its converted schema
 */
export interface CrdVersion {
  name: string
  served: boolean
  /** Whether this is the version persisted by the API server */
  storage: boolean
  /** Missing when the version declares no `openAPIV3Schema` */
  schema?: SchemaNode
}

/**
 * Resource identity and versioned schemas extracted from one CRD document
 */
export interface CrdDocument {
  kind: string
  plural: string
  listKind: string
  group: string
  versions: CrdVersion[]
  /** File path or URL the document was read from */
  source?: string
}

/**
 * Injectable I/O for reading CRD sources
 */
export interface LoadOptions {
  /** Defaults to the global fetch */
  fetch?: (url: string) => Promise<{ ok: boolean; status: number; statusText: string; text(): Promise<string> }>
  /** Defaults to fs.readFile with utf-8 encoding */
  readFile?: (path: string) => Promise<string>
}
