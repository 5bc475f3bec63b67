import type { CrdDocument, CrdVersion } from "@/loader/types"
import { toSchemaNode } from "@/schema/convert"
import type { RawSchemaProps } from "@/schema/raw"

export const object = (properties: Record<string, RawSchemaProps>, extra: RawSchemaProps = {}): RawSchemaProps => ({
  type: "object",
  properties,
  ...extra,
})

export const string = (extra: RawSchemaProps = {}): RawSchemaProps => ({ type: "string", ...extra })

export const arrayOf = (items: RawSchemaProps): RawSchemaProps => ({ type: "array", items })

/**
 * The usual status condition record
 */
export const condition = (): RawSchemaProps =>
  object(
    {
      lastTransitionTime: string({ format: "date-time" }),
      message: string(),
      reason: string(),
      status: string({ enum: ["True", "False", "Unknown"] }),
      type: string(),
    },
    { required: ["lastTransitionTime", "message", "reason", "status", "type"] },
  )

interface CrdOptions {
  group?: string
  version?: string
  plural?: string
  /** Replaces the single storage version built from `schema` */
  versions?: CrdVersion[]
}

/**
 * Build a loaded CRD with one storage version
 */
export function makeCrd(kind: string, schema: RawSchemaProps, options: CrdOptions = {}): CrdDocument {
  return {
    kind,
    plural: options.plural ?? `${kind.toLowerCase()}s`,
    listKind: `${kind}List`,
    group: options.group ?? "example.com",
    versions: options.versions ?? [{ name: options.version ?? "v1", served: true, storage: true, schema: toSchemaNode(schema) }],
  }
}
