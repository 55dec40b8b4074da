import { parseColor } from '../parsers/color'
import { ParseError } from '../parsers/exceptions'
import { parseStyleMap } from '../parsers/values'
import { Paint, PaintType, solid } from '../types/paint'
import { SvgNode } from '../types/svg'
import { WarningSink } from '../utils/log'
import { AffineTransform } from '../utils/transform'

/**
 * Inherited drawing state at one level of the element tree. Each element derives its own context
 * from its parent's; nothing is ever mutated, so leaving a subtree restores the parent state.
 *
 * Paints are held as written. Opacity is folded into their alpha only when an element is emitted.
 */
export type ParseContext = {
  readonly transform: AffineTransform
  readonly fill: Paint
  readonly stroke: Paint
  readonly opacity: number
  readonly fillOpacity: number
  readonly strokeOpacity: number
}

export function createRootContext(transform: AffineTransform): ParseContext {
  return {
    transform,
    fill: solid(0, 0, 0),
    stroke: solid(0, 0, 0, 0),
    opacity: 1,
    fillOpacity: 1,
    strokeOpacity: 1
  }
}

// Accepts a number or a percentage, clamped to [0, 1].
export function parseOpacity(value: string | undefined, name: string, fallback: number): number {
  const text = value?.trim()
  if (!text || text === 'inherit') {
    return fallback
  }
  const num = parseFloat(text)
  if (isNaN(num)) {
    throw new ParseError(`Invalid ${name}: ${value}`)
  }
  return Math.min(1, Math.max(0, text.endsWith('%') ? num / 100 : num))
}

// Attribute and style values of a channel opacity multiply; with neither, the parent's applies.
function readChannelOpacity(
  attribute: string | undefined,
  style: string | undefined,
  name: string,
  inherited: number
): number {
  const values = [attribute, style].filter(
    (value): value is string => !!value?.trim() && value.trim() !== 'inherit'
  )
  if (values.length === 0) {
    return inherited
  }
  return values.reduce((product, value) => product * parseOpacity(value, name, 1), 1)
}

function readPaint(value: string | undefined, inherited: Paint, warn: WarningSink): Paint {
  return value?.trim() === 'inherit' ? inherited : parseColor(value, inherited, warn)
}

/**
 * Derives the context of `element` from its parent. Properties set in the `style` attribute take
 * precedence over presentation attributes of the same name, except `fill-opacity` and
 * `stroke-opacity`, where both apply.
 *
 * Throws ParseError on a malformed transform or opacity.
 */
export function deriveContext(
  parent: ParseContext,
  element: SvgNode,
  warn: WarningSink
): ParseContext {
  const attributes = element.attributes
  const styles = parseStyleMap(attributes['style'] ?? '')
  const property = (name: string) => styles.get(name) ?? attributes[name]

  return {
    transform: parent.transform.compose(AffineTransform.parse(attributes['transform'])),
    fill: readPaint(property('fill'), parent.fill, warn),
    stroke: readPaint(property('stroke'), parent.stroke, warn),
    opacity: parent.opacity * parseOpacity(property('opacity'), 'opacity', 1),
    fillOpacity: readChannelOpacity(
      attributes['fill-opacity'],
      styles.get('fill-opacity'),
      'fill-opacity',
      parent.fillOpacity
    ),
    strokeOpacity: readChannelOpacity(
      attributes['stroke-opacity'],
      styles.get('stroke-opacity'),
      'stroke-opacity',
      parent.strokeOpacity
    )
  }
}

// Scales the alpha of a solid paint, truncating to an integer.
export function applyOpacity(paint: Paint, opacity: number): Paint {
  if (paint.type !== PaintType.Solid) {
    return paint
  }
  return { ...paint, color: { ...paint.color, a: Math.trunc(opacity * paint.color.a) } }
}

/**
 * The fill and stroke an element is emitted with. With `strokeFromFill`, a fully transparent
 * solid stroke is replaced by the fill.
 */
export function resolvePaints(
  context: ParseContext,
  strokeFromFill: boolean
): { fill: Paint; stroke: Paint } {
  const fill = applyOpacity(context.fill, context.opacity * context.fillOpacity)
  const stroke = applyOpacity(context.stroke, context.opacity * context.strokeOpacity)

  if (strokeFromFill && stroke.type === PaintType.Solid && stroke.color.a === 0) {
    return { fill, stroke: fill }
  }
  return { fill, stroke }
}
