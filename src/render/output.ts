import { mkdir, writeFile } from "node:fs/promises"
import path from "node:path"
import type { Logger } from "@/logger"
import type { CompiledBatch } from "@/model/types"
import { renderGroupVersionInfo, renderResource, resourceModuleName } from "@/render/typescript"

/**
 * A rendered file, relative to the output directory
 */
export interface OutputFile {
  path: string
  content: string
  /** Resource kind, for resource modules */
  kind?: string
}

export interface WriteOptions {
  /** Directory the version directory is created in */
  targetDir: string
  /** Defaults to console */
  logger?: Logger
}

/**
 * Render every module of a batch: `<version>/types_<kind>.ts` per resource and
 * `<version>/group_version_info.ts`
 */
export function renderBatch(batch: CompiledBatch): OutputFile[] {
  const files: OutputFile[] = batch.resources.map((model) => ({
    path: path.posix.join(batch.version, `${resourceModuleName(model.descriptor.kind)}.ts`),
    content: renderResource(model, batch),
    kind: model.descriptor.kind,
  }))

  files.push({
    path: path.posix.join(batch.version, "group_version_info.ts"),
    content: renderGroupVersionInfo(batch),
  })

  return files
}

/**
 * Render a batch and write its files below the target directory
 * @returns Absolute paths of the written files
 */
export async function writeOutput(batch: CompiledBatch, options: WriteOptions): Promise<string[]> {
  const logger = options.logger ?? console
  const written: string[] = []

  for (const file of renderBatch(batch)) {
    const target = path.resolve(options.targetDir, file.path)
    await mkdir(path.dirname(target), { recursive: true })
    await writeFile(target, file.content, "utf-8")
    written.push(target)

    const subject = file.kind ? `types for ${file.kind}` : "group version info"
    logger.info(`Generated ${subject} (group=${batch.group}, version=${batch.version}): ${target}`)
  }

  return written
}
