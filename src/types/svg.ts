// A single element of a parsed SVG document, namespace prefixes removed.
export type SvgNode = {
  tag: string
  attributes: Record<string, string>
  children: SvgNode[]
  text: string
}
