// Receives non-fatal diagnostics raised while parsing.
export type WarningSink = (message: string) => void

export const consoleWarningSink: WarningSink = (message) => {
  console.warn(`Warning: SVG parser - ${message}`)
}
