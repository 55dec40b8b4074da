import { describe, expect, it, jest } from '@jest/globals'
import { parseColor } from '../src/parsers/color'
import { gradientRef, NO_PAINT, solid } from '../src/types/paint'

const BLACK = solid(0, 0, 0)

describe('parseColor', () => {
  it('should return the fallback for absent or empty values', () => {
    expect(parseColor(undefined, BLACK)).toBe(BLACK)
    expect(parseColor('  ', BLACK)).toBe(BLACK)
  })

  it('should parse none', () => {
    expect(parseColor('none', BLACK)).toEqual(NO_PAINT)
  })

  it('should parse short and long hex', () => {
    expect(parseColor('#f80', BLACK)).toEqual(solid(255, 136, 0))
    expect(parseColor('#1A2b3C', BLACK)).toEqual(solid(26, 43, 60))
  })

  it('should parse rgb and rgba', () => {
    expect(parseColor('rgb(10, 20, 30)', BLACK)).toEqual(solid(10, 20, 30))
    expect(parseColor('rgb(100%, 50%, 0%)', BLACK)).toEqual(solid(255, 128, 0))
    expect(parseColor('rgba(10,20,30,0.5)', BLACK)).toEqual(solid(10, 20, 30, 128))
    expect(parseColor('rgb(300, -5, 7)', BLACK)).toEqual(solid(255, 0, 7))
  })

  it('should parse named colours case-insensitively', () => {
    expect(parseColor('Red', BLACK)).toEqual(solid(255, 0, 0))
    expect(parseColor('cornflowerblue', BLACK)).toEqual(solid(100, 149, 237))
    expect(parseColor('transparent', BLACK)).toEqual(solid(0, 0, 0, 0))
  })

  it('should parse gradient references', () => {
    expect(parseColor('url(#fade)', BLACK)).toEqual(gradientRef('fade'))
  })

  it('should warn and return no paint for malformed colours', () => {
    const warn = jest.fn<(message: string) => void>()
    expect(parseColor('#12', BLACK, warn)).toEqual(NO_PAINT)
    expect(parseColor('rgb(1, 2)', BLACK, warn)).toEqual(NO_PAINT)
    expect(parseColor('notacolour', BLACK, warn)).toEqual(NO_PAINT)
    expect(warn).toHaveBeenCalledTimes(3)
    expect(warn).toHaveBeenCalledWith("Could not parse colour '#12': Unrecognised colour syntax")
  })
})
