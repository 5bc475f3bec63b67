#!/usr/bin/env node
/**
 * crd-typegen CLI
 *
 * Generates TypeScript types from one or more CRDs of the same API group:
 *
 *   crd-typegen --crd widgets.yaml --crd https://example.com/gadgets.yaml --target src/api
 *
 * CRDs are fetched concurrently but compiled in the order the --crd flags are given,
 * since that order decides which resource gets the shorter name for a shared shape.
 */

import { pathToFileURL } from "node:url"
import { Command } from "commander"
import { compileBatch } from "@/compiler/compiler"
import { CrdGenError } from "@/errors"
import { loadCrds } from "@/loader/read"
import type { Logger } from "@/logger"
import { writeOutput } from "@/render/output"

export interface GenerateOptions {
  crd: string[]
  target: string
  version?: string
  pointer?: boolean
}

const collect = (value: string, previous: string[] = []) => [...previous, value]

/**
 * Load, compile and write one batch
 * @returns Paths of the written files
 */
export async function generate(options: GenerateOptions, logger: Logger = console): Promise<string[]> {
  if (options.crd.length === 0) {
    throw new CrdGenError("at least one CRD must be defined")
  }

  logger.info(`Generating types (target=${options.target}, crd=${options.crd.join(",")}, version=${options.version ?? "<storage>"})`)

  const docs = await loadCrds(options.crd)
  const batch = compileBatch(docs, { version: options.version, pointers: options.pointer ?? false })

  for (const ref of batch.unresolvedRefs) {
    logger.warn(`$ref "${ref}" does not resolve to a generated type; it is emitted as unknown`)
  }

  return writeOutput(batch, { targetDir: options.target, logger })
}

/**
 * Build the command so tests can run it with their own arguments
 */
export function createProgram(logger: Logger = console): Command {
  const program = new Command()

  program
    .name("crd-typegen")
    .description("Generate TypeScript types from Kubernetes CustomResourceDefinitions")
    .requiredOption("--crd <source>", "CRD file or http(s) URL to process (repeatable)", collect, [])
    .requiredOption("--target <dir>", "Directory to write the generated files to")
    .option("--version <version>", "Version to select from every CRD; defaults to the storage version")
    .option("--pointer", "Generate optional fields for nested structs", false)
    .action(async (options: GenerateOptions) => {
      await generate(options, logger)
    })

  return program
}

async function main() {
  try {
    await createProgram().parseAsync(process.argv)
  } catch (err) {
    console.error(`Error: ${CrdGenError.from(err).message}`)
    process.exit(1)
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main()
}
