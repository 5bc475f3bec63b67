import * as z from "zod"

/**
 * Subset of the Kubernetes `JSONSchemaProps` that the compiler understands.
 * Every other keyword is ignored.
 */
export interface RawSchemaProps {
  type?: string
  format?: string
  description?: string
  properties?: Record<string, RawSchemaProps>
  items?: RawSchemaProps | RawSchemaProps[]
  enum?: (string | number | boolean | null)[]
  $ref?: string
  additionalProperties?: boolean | RawSchemaProps
  required?: string[]
  "x-kubernetes-preserve-unknown-fields"?: boolean
  "x-kubernetes-int-or-string"?: boolean
}

export const RawSchemaPropsSchema: z.ZodType<RawSchemaProps> = z.lazy(() =>
  z.object({
    type: z.string().optional(),
    format: z.string().optional(),
    description: z.string().optional(),
    properties: z.record(z.string(), RawSchemaPropsSchema).optional(),
    items: z.union([RawSchemaPropsSchema, z.array(RawSchemaPropsSchema)]).optional(),
    enum: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
    $ref: z.string().optional(),
    additionalProperties: z.union([z.boolean(), RawSchemaPropsSchema]).optional(),
    required: z.array(z.string()).optional(),
    "x-kubernetes-preserve-unknown-fields": z.boolean().optional(),
    "x-kubernetes-int-or-string": z.boolean().optional(),
  }),
)

export const RawCrdVersionSchema = z.object({
  name: z.string().min(1),
  served: z.boolean().default(true),
  storage: z.boolean().default(false),
  schema: z
    .object({
      openAPIV3Schema: RawSchemaPropsSchema,
    })
    .optional(),
})

/**
 * `apiextensions.k8s.io/v1` CustomResourceDefinition envelope
 */
export const RawCrdSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.literal("CustomResourceDefinition"),
  spec: z.object({
    group: z.string(),
    names: z.object({
      kind: z.string().min(1),
      plural: z.string().min(1),
      listKind: z.string().optional(),
      singular: z.string().optional(),
    }),
    versions: z.array(RawCrdVersionSchema).min(1),
  }),
})

export type RawCrd = z.infer<typeof RawCrdSchema>

export type RawCrdVersion = z.infer<typeof RawCrdVersionSchema>
