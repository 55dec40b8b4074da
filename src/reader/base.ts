import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { promises as fs } from 'node:fs'
import { ungzip } from 'pako'
import { ElementType } from '../types/elements'
import { SvgNode } from '../types/svg'

export class SvgReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SvgReadError'
  }
}

// Key under which fast-xml-parser keeps attributes when `preserveOrder` is set.
const ATTRIBUTES_KEY = ':@'
const TEXT_KEY = '#text'

type XmlRecord = Record<string, unknown>

function isRecord(value: unknown): value is XmlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// The gzip magic bytes followed by the deflate method.
export function isGzip(buffer: Uint8Array): boolean {
  return buffer.length >= 3 && buffer[0] === 0x1f && buffer[1] === 0x8b && buffer[2] === 0x08
}

/**
 * Reads SVG text, buffers or files (plain or gzip-compressed) into an SvgNode tree rooted at the
 * outermost `svg` element. Namespace prefixes are dropped, so `xlink:href` arrives as `href`.
 */
export class SvgReader {
  private xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    preserveOrder: true,
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true
  })

  private readAttributes(value: unknown): Record<string, string> {
    const attributes: Record<string, string> = {}
    if (!isRecord(value)) {
      return attributes
    }
    for (const [key, attribute] of Object.entries(value)) {
      if (
        typeof attribute === 'string' ||
        typeof attribute === 'number' ||
        typeof attribute === 'boolean'
      ) {
        attributes[key] = String(attribute)
      }
    }
    return attributes
  }

  private readText(items: unknown): string {
    if (!Array.isArray(items)) {
      return ''
    }
    return items
      .filter(isRecord)
      .map((item) => item[TEXT_KEY])
      .filter((text) => text !== undefined)
      .map(String)
      .join('')
  }

  private readNodes(items: unknown): SvgNode[] {
    const nodes: SvgNode[] = []
    if (!Array.isArray(items)) {
      return nodes
    }

    for (const item of items) {
      if (!isRecord(item)) {
        continue
      }
      for (const [tag, children] of Object.entries(item)) {
        if (tag === ATTRIBUTES_KEY || tag === TEXT_KEY) {
          continue
        }
        nodes.push({
          tag,
          attributes: this.readAttributes(item[ATTRIBUTES_KEY]),
          children: this.readNodes(children),
          text: this.readText(children)
        })
      }
    }

    return nodes
  }

  public readString(content: string): SvgNode {
    const validation = XMLValidator.validate(content)
    if (validation !== true) {
      const { msg, line, col } = validation.err
      throw new SvgReadError(`Malformed XML at line ${line}, column ${col}: ${msg}`)
    }

    const parsed: unknown = this.xmlParser.parse(content)
    const [root] = this.readNodes(parsed)
    if (!root || root.tag !== ElementType.Svg) {
      throw new SvgReadError('No SVG element found')
    }

    return root
  }

  public readBuffer(buffer: Uint8Array): SvgNode {
    const bytes = isGzip(buffer) ? this.decompress(buffer) : buffer
    return this.readString(Buffer.from(bytes).toString('utf8'))
  }

  private decompress(buffer: Uint8Array): Uint8Array {
    // pako throws on corrupt data but yields nothing for a stream cut short.
    let bytes: Uint8Array | undefined
    try {
      bytes = ungzip(buffer)
    } catch (error) {
      throw new SvgReadError(`Failed to decompress SVG: ${error}`)
    }
    if (!bytes) {
      throw new SvgReadError('Failed to decompress SVG: truncated gzip stream')
    }
    return bytes
  }

  public async readFile(filepath: string): Promise<SvgNode> {
    try {
      const content = await fs.readFile(filepath)
      return this.readBuffer(content)
    } catch (error) {
      if (error instanceof SvgReadError) {
        throw error
      }
      throw new SvgReadError(`Failed to read Svg file ${filepath}: ${error}`)
    }
  }
}
