import { loadAll } from "js-yaml"
import type { ZodError } from "zod"
import { SchemaError } from "@/errors"
import { RawCrdSchema } from "@/schema/raw"
import { toSchemaNode } from "@/schema/convert"
import type { CrdDocument, CrdVersion } from "@/loader/types"

/**
 * Render the first validation issue as `path: message`
 */
function describeIssue(error: ZodError): string {
  const issue = error.issues[0]
  if (!issue) return error.message
  const path = issue.path.map((segment) => String(segment)).join(".")
  return path ? `${path}: ${issue.message}` : issue.message
}

const isCrdLike = (doc: unknown): boolean =>
  typeof doc === "object" && doc !== null && "kind" in doc && doc.kind === "CustomResourceDefinition"

/**
 * Parse a YAML or JSON CRD document.
 * In a multi-document stream the first CustomResourceDefinition is used.
 *
 * @param text - Raw document contents
 * @param source - File path or URL, used in error messages
 */
export function parseCrd(text: string, source?: string): CrdDocument {
  let documents: unknown[]
  try {
    documents = loadAll(text)
  } catch (err) {
    throw new SchemaError({ message: `invalid YAML: ${err instanceof Error ? err.message : String(err)}`, source, cause: err })
  }

  const candidates = documents.filter((doc) => doc !== null && doc !== undefined)
  if (candidates.length === 0) {
    throw new SchemaError({ message: "document is empty", source })
  }

  const document = candidates.find(isCrdLike) ?? candidates[0]
  const result = RawCrdSchema.safeParse(document)
  if (!result.success) {
    throw new SchemaError({ message: `not a valid CustomResourceDefinition (${describeIssue(result.error)})`, source, cause: result.error })
  }

  const { spec } = result.data
  const versions: CrdVersion[] = spec.versions.map((version) => ({
    name: version.name,
    served: version.served,
    storage: version.storage,
    ...(version.schema ? { schema: toSchemaNode(version.schema.openAPIV3Schema) } : {}),
  }))

  return {
    kind: spec.names.kind,
    plural: spec.names.plural,
    listKind: spec.names.listKind ?? `${spec.names.kind}List`,
    group: spec.group,
    versions,
    ...(source ? { source } : {}),
  }
}

/**
 * Pick the version to compile: the storage version when no version is desired,
 * otherwise the version with the desired name.
 */
export function selectVersion(doc: CrdDocument, desired?: string): CrdVersion | undefined {
  if (!desired) {
    return doc.versions.find((version) => version.storage)
  }
  return doc.versions.find((version) => version.name === desired)
}
