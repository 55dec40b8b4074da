export type Rgba = {
  r: number
  g: number
  b: number
  a: number
}

export enum PaintType {
  None = 'none',
  Solid = 'solid',
  Gradient = 'gradient'
}

export type NoPaint = {
  type: PaintType.None
}

export type SolidPaint = {
  type: PaintType.Solid
  color: Rgba
}

// A reference to a gradient registered under `id` in the document.
export type GradientPaint = {
  type: PaintType.Gradient
  id: string
}

export type Paint = NoPaint | SolidPaint | GradientPaint

export const NO_PAINT: NoPaint = { type: PaintType.None }

export function solid(r: number, g: number, b: number, a: number = 255): SolidPaint {
  return { type: PaintType.Solid, color: { r, g, b, a } }
}

export function gradientRef(id: string): GradientPaint {
  return { type: PaintType.Gradient, id }
}
