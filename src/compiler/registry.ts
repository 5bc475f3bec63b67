/**
 * Result of a registry lookup-or-assignment
 */
export interface AssignedName {
  name: string
  /** False when the signature had already been named earlier in the batch */
  isNew: boolean
}

/**
 * Names generated types for one compilation batch.
 * Pairs a signature-to-name memo (so identical shapes collapse to one type) with the set of
 * names already taken (so distinct shapes never share one). Create one per batch and pass it
 * to every resource compiled in that batch.
 */
export class NamingRegistry {
  private _signatureToName: Map<string, string> = new Map()
  private _reserved: Set<string> = new Set()

  /**
   * Return the name already assigned to a signature, or assign the first free candidate
   * @param signature - Content digest of the schema fragment
   * @param candidates - Names in order of preference
   */
  getOrAssign(signature: string, candidates: Iterable<string>): AssignedName {
    const existing = this._signatureToName.get(signature)
    if (existing !== undefined) {
      return { name: existing, isNew: false }
    }

    for (const candidate of candidates) {
      if (!this._reserved.has(candidate)) {
        this._reserved.add(candidate)
        this._signatureToName.set(signature, candidate)
        return { name: candidate, isNew: true }
      }
    }

    throw new Error(`No free type name left for signature ${signature}`)
  }

  /**
   * Get the name assigned to a signature, if any
   */
  lookup(signature: string): string | undefined {
    return this._signatureToName.get(signature)
  }

  /**
   * Take a name that does not belong to any signature (e.g. a root kind)
   * @returns false if the name was already taken
   */
  reserve(name: string): boolean {
    if (this._reserved.has(name)) return false
    this._reserved.add(name)
    return true
  }

  isReserved(name: string): boolean {
    return this._reserved.has(name)
  }

  /**
   * Number of distinct signatures named so far
   */
  get size(): number {
    return this._signatureToName.size
  }
}
