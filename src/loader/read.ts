import { readFile as fsReadFile } from "node:fs/promises"
import { InputError } from "@/errors"
import { parseCrd } from "@/loader/parse"
import type { CrdDocument, LoadOptions } from "@/loader/types"

type FetchLike = NonNullable<LoadOptions["fetch"]>

const isUrl = (source: string) => source.startsWith("http://") || source.startsWith("https://")

async function readSource(source: string, options: LoadOptions): Promise<string> {
  if (isUrl(source)) {
    const fetchFn: FetchLike = options.fetch ?? fetch
    let response: Awaited<ReturnType<FetchLike>>
    try {
      response = await fetchFn(source)
    } catch (err) {
      throw new InputError({ source, message: err instanceof Error ? err.message : String(err), cause: err })
    }
    if (!response.ok) {
      throw new InputError({ source, message: `HTTP ${response.status} ${response.statusText}`.trim() })
    }
    try {
      return await response.text()
    } catch (err) {
      throw new InputError({ source, message: `reading response body: ${err instanceof Error ? err.message : String(err)}`, cause: err })
    }
  }

  const readFile = options.readFile ?? ((path: string) => fsReadFile(path, "utf-8"))
  try {
    return await readFile(source)
  } catch (err) {
    throw new InputError({ source, message: err instanceof Error ? err.message : String(err), cause: err })
  }
}

/**
 * Read and parse one CRD from a local path or an http(s) URL
 */
export async function readCrd(source: string, options: LoadOptions = {}): Promise<CrdDocument> {
  const text = await readSource(source, options)
  return parseCrd(text, source)
}

/**
 * Read all sources concurrently. The result keeps the order of `sources`,
 * which is the order the compiler must see them in.
 */
export async function loadCrds(sources: string[], options: LoadOptions = {}): Promise<CrdDocument[]> {
  return Promise.all(sources.map((source) => readCrd(source, options)))
}
