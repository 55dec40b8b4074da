import { DocumentCache } from './cache/document_cache'
import { SvgDocument } from './document/document'
import { DocumentWalker } from './document/walker'
import { SvgReader } from './reader/base'
import { ParseOptions } from './types/options'
import { SvgNode } from './types/svg'
import { resolveOptions } from './utils/options'

// Builds the document for an already parsed element tree.
export function parse(root: SvgNode, options: ParseOptions = {}): SvgDocument {
  return new DocumentWalker(resolveOptions(options)).walk(root)
}

export function parseString(content: string, options: ParseOptions = {}): SvgDocument {
  return parse(new SvgReader().readString(content), options)
}

/**
 * Reads and parses an .svg or .svgz file. With a cache, repeated loads of the same file at the
 * same resolution return the cached document.
 */
export async function loadSvg(
  filepath: string,
  options: ParseOptions = {},
  cache?: DocumentCache
): Promise<SvgDocument> {
  const walker = new DocumentWalker(resolveOptions(options))
  const load = async () => walker.walk(await new SvgReader().readFile(filepath))

  return cache ? cache.getOrLoad(filepath, options, load) : load()
}
