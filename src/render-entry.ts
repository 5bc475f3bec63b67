/**
 * crd-typegen/render
 *
 * TypeScript rendering of a compiled batch.
 */

export * from "@/render"
