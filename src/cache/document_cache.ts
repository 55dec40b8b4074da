import { SvgDocument } from '../document/document'
import { ParseOptions } from '../types/options'
import { resolveOptions } from '../utils/options'

/**
 * Parsed documents keyed by source and by every option that shapes the result. The same file
 * parsed with a different resolution, tolerance or orientation is a separate entry; the warning
 * sink is not part of the key.
 */
export class DocumentCache {
  private readonly entries = new Map<string, SvgDocument>()
  private readonly pending = new Map<string, Promise<SvgDocument>>()

  static keyFor(source: string, options: ParseOptions = {}): string {
    const resolved = resolveOptions(options)
    return [
      source,
      resolved.bezierPoints,
      resolved.circlePoints,
      resolved.tolerance,
      resolved.maxFlattenPoints,
      resolved.invertY,
      resolved.strokeFromFill,
      resolved.fitViewBox
    ].join('|')
  }

  get size(): number {
    return this.entries.size
  }

  get(source: string, options: ParseOptions = {}): SvgDocument | undefined {
    return this.entries.get(DocumentCache.keyFor(source, options))
  }

  set(source: string, options: ParseOptions, document: SvgDocument): void {
    this.entries.set(DocumentCache.keyFor(source, options), document)
  }

  // Loads at most once per key; concurrent callers share the in-flight load.
  async getOrLoad(
    source: string,
    options: ParseOptions,
    load: () => Promise<SvgDocument>
  ): Promise<SvgDocument> {
    const key = DocumentCache.keyFor(source, options)
    const cached = this.entries.get(key)
    if (cached) {
      return cached
    }

    let loading = this.pending.get(key)
    if (!loading) {
      loading = load()
      this.pending.set(key, loading)
    }

    try {
      const document = await loading
      this.entries.set(key, document)
      return document
    } finally {
      this.pending.delete(key)
    }
  }

  delete(source: string, options: ParseOptions = {}): boolean {
    return this.entries.delete(DocumentCache.keyFor(source, options))
  }

  clear(): void {
    this.entries.clear()
    this.pending.clear()
  }
}
