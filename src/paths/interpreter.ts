import { ParseError } from '../parsers/exceptions'
import { isLetterToken, tokenize } from '../parsers/values'
import { Point } from '../types/base'
import { isPathCommand, PathCommandType } from '../types/paths'
import { WarningSink } from '../utils/log'
import { PathBuilder } from './builder'

function reflect(control: Point | null, through: Point): Point {
  if (!control) {
    return { ...through }
  }
  return { x: 2 * through.x - control.x, y: 2 * through.y - control.y }
}

/**
 * Walks SVG path data (the `d` attribute) and drives a PathBuilder.
 *
 * A command letter stays in effect for every following group of numbers until the next letter;
 * after a move the repeats are treated as lines. Unknown letters are reported and skipped along
 * with their numbers. Running out of numbers mid-command raises a ParseError.
 */
export class SvgPathInterpreter {
  private tokens: string[] = []
  private iToken = 0
  private command: PathCommandType | null = null

  constructor(
    private readonly builder: PathBuilder,
    private readonly warn: WarningSink
  ) {}

  run(pathData: string): void {
    this.tokens = tokenize(pathData)
    this.iToken = 0
    this.command = null

    while (this.iToken < this.tokens.length) {
      const token = this.tokens[this.iToken]

      if (isLetterToken(token)) {
        this.iToken++
        if (!isPathCommand(token)) {
          this.warn(`Unrecognised path command: ${token}`)
          this.command = null
          this.skipNumbers()
          continue
        }
        this.command = this.execute(token)
        continue
      }

      // A number without a command letter in effect.
      if (this.command === null) {
        this.warn(`Path data has coordinates without a command: ${token}`)
        this.skipNumbers()
        continue
      }
      if (
        this.command === PathCommandType.StopAbsolute ||
        this.command === PathCommandType.StopRelative
      ) {
        this.warn(`Unexpected coordinates after closepath: ${token}`)
        this.skipNumbers()
        continue
      }

      this.command = this.execute(this.command)
    }
  }

  private skipNumbers(): void {
    while (this.iToken < this.tokens.length && !isLetterToken(this.tokens[this.iToken])) {
      this.iToken++
    }
  }

  private nextNumber(command: PathCommandType): number {
    const token = this.tokens[this.iToken]
    if (token === undefined || isLetterToken(token)) {
      throw new ParseError(`Missing parameters for ${command}`)
    }
    this.iToken++
    return parseFloat(token)
  }

  // Flags are one character each and may run into what follows, as in `a5 5 0 0110 10`.
  private nextFlag(command: PathCommandType): boolean {
    const token = this.tokens[this.iToken]
    if (token === undefined || isLetterToken(token)) {
      throw new ParseError(`Missing parameters for ${command}`)
    }
    const flag = token[0]
    if (flag !== '0' && flag !== '1') {
      throw new ParseError(`Invalid arc flag for ${command}: ${token}`)
    }
    if (token.length > 1) {
      this.tokens[this.iToken] = token.slice(1)
    } else {
      this.iToken++
    }
    return flag === '1'
  }

  private nextPoint(command: PathCommandType, origin?: Point): Point {
    const x = this.nextNumber(command)
    const y = this.nextNumber(command)
    return origin ? { x: origin.x + x, y: origin.y + y } : { x, y }
  }

  // Runs one parameter group and returns the command that repeats for the next group.
  private execute(command: PathCommandType): PathCommandType {
    const builder = this.builder
    const current = builder.position

    switch (command) {
      case PathCommandType.MoveAbsolute:
        builder.moveTo(this.nextPoint(command))
        return PathCommandType.LineAbsolute

      case PathCommandType.MoveRelative:
        builder.moveTo(this.nextPoint(command, current))
        return PathCommandType.LineRelative

      case PathCommandType.LineAbsolute:
        builder.lineTo(this.nextPoint(command))
        break

      case PathCommandType.LineRelative:
        builder.lineTo(this.nextPoint(command, current))
        break

      case PathCommandType.HorizontalLineAbsolute:
        builder.lineTo({ x: this.nextNumber(command), y: current.y })
        break

      case PathCommandType.HorizontalLineRelative:
        builder.lineTo({ x: current.x + this.nextNumber(command), y: current.y })
        break

      case PathCommandType.VerticalLineAbsolute:
        builder.lineTo({ x: current.x, y: this.nextNumber(command) })
        break

      case PathCommandType.VerticalLineRelative:
        builder.lineTo({ x: current.x, y: current.y + this.nextNumber(command) })
        break

      case PathCommandType.CubicBezierAbsolute:
      case PathCommandType.CubicBezierRelative: {
        const origin = command === PathCommandType.CubicBezierRelative ? current : undefined
        const control1 = this.nextPoint(command, origin)
        const control2 = this.nextPoint(command, origin)
        builder.curveTo(control1, control2, this.nextPoint(command, origin))
        break
      }

      case PathCommandType.CubicBezierSmoothAbsolute:
      case PathCommandType.CubicBezierSmoothRelative: {
        const origin = command === PathCommandType.CubicBezierSmoothRelative ? current : undefined
        const control1 = reflect(builder.previousCubicControl, current)
        const control2 = this.nextPoint(command, origin)
        builder.curveTo(control1, control2, this.nextPoint(command, origin))
        break
      }

      case PathCommandType.QuadraticBezierAbsolute:
      case PathCommandType.QuadraticBezierRelative: {
        const origin = command === PathCommandType.QuadraticBezierRelative ? current : undefined
        const control = this.nextPoint(command, origin)
        builder.quadraticTo(control, this.nextPoint(command, origin))
        break
      }

      case PathCommandType.QuadraticBezierSmoothAbsolute:
      case PathCommandType.QuadraticBezierSmoothRelative: {
        const origin =
          command === PathCommandType.QuadraticBezierSmoothRelative ? current : undefined
        const control = reflect(builder.previousQuadraticControl, current)
        builder.quadraticTo(control, this.nextPoint(command, origin))
        break
      }

      case PathCommandType.EllipticalArcAbsolute:
      case PathCommandType.EllipticalArcRelative: {
        const rx = this.nextNumber(command)
        const ry = this.nextNumber(command)
        const xAxisRotation = this.nextNumber(command)
        const largeArc = this.nextFlag(command)
        const sweep = this.nextFlag(command)
        const origin = command === PathCommandType.EllipticalArcRelative ? current : undefined
        builder.arcTo(rx, ry, xAxisRotation, largeArc, sweep, this.nextPoint(command, origin))
        break
      }

      case PathCommandType.StopAbsolute:
      case PathCommandType.StopRelative:
        builder.closePath()
        break
    }

    return command
  }
}
