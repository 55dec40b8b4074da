// Path data commands, keyed by their letter. Lower case is relative to the current point.
export enum PathCommandType {
  MoveAbsolute = 'M',
  MoveRelative = 'm',
  LineAbsolute = 'L',
  LineRelative = 'l',
  HorizontalLineAbsolute = 'H',
  HorizontalLineRelative = 'h',
  VerticalLineAbsolute = 'V',
  VerticalLineRelative = 'v',
  CubicBezierAbsolute = 'C',
  CubicBezierRelative = 'c',
  CubicBezierSmoothAbsolute = 'S',
  CubicBezierSmoothRelative = 's',
  QuadraticBezierAbsolute = 'Q',
  QuadraticBezierRelative = 'q',
  QuadraticBezierSmoothAbsolute = 'T',
  QuadraticBezierSmoothRelative = 't',
  EllipticalArcAbsolute = 'A',
  EllipticalArcRelative = 'a',
  StopAbsolute = 'Z',
  StopRelative = 'z'
}

const PATH_COMMANDS: ReadonlySet<string> = new Set(Object.values(PathCommandType))

export function isPathCommand(letter: string): letter is PathCommandType {
  return PATH_COMMANDS.has(letter)
}
