import { describe, expect, it, jest } from '@jest/globals'
import path from 'path'
import { LinearGradient } from '../src/gradients/gradient'
import { loadSvg, parseString } from '../src/main'
import { ParseOptions } from '../src/types/options'
import { gradientRef, NO_PAINT, solid } from '../src/types/paint'
import { calculateMeshArea } from '../src/utils/geometry'

const dataDir = path.join(__dirname, 'data')

function quiet(options: ParseOptions = {}): ParseOptions {
  return { warn: () => {}, ...options }
}

function svg(body: string, rootAttributes = 'width="100" height="100"'): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" ${rootAttributes}>${body}</svg>`
}

describe('Document', () => {
  describe('Loading', () => {
    it('should collect every drawable shape in document order', async () => {
      const warn = jest.fn<(message: string) => void>()
      const document = await loadSvg(path.join(dataDir, 'basic_shapes.svg'), { warn })

      expect(warn).not.toHaveBeenCalled()
      expect(document.width).toBe(100)
      expect(document.height).toBe(50)
      expect(document.paths.map((p) => p.id)).toEqual(['box', 'dot', 'tri', undefined])
    })

    it('should fill a parsed rect with two triangles covering its area', () => {
      const document = parseString(svg('<rect width="10" height="10"/>'), quiet())
      const triangles = document.paths[0].triangles ?? []
      expect(triangles).toHaveLength(6)
      expect(calculateMeshArea(triangles)).toBeCloseTo(100)
    })

    it('should resolve paints, transforms and metadata', async () => {
      const document = await loadSvg(path.join(dataDir, 'basic_shapes.svg'), quiet())

      const box = document.pathById('box')
      expect(box?.fill).toEqual(solid(255, 0, 0))
      expect(box?.stroke).toEqual(solid(255, 0, 0))
      expect(calculateMeshArea(box?.worldTriangles ?? [])).toBeCloseTo(200)

      const dot = document.pathById('dot')
      expect(dot?.fill).toEqual(solid(0, 0, 255))
      expect(dot?.worldLoops[0][0]).toEqual({ x: 60, y: 5 })

      const tri = document.pathById('tri')
      expect(tri?.fill).toEqual(gradientRef('fade'))
      expect(tri?.title).toBe('Triangle')
      expect(tri?.description).toBe('A gradient filled triangle')
      expect(tri?.bounds).toEqual({ xMin: 0, yMin: 20, xMax: 10, yMax: 30 })

      const outline = document.paths[3]
      expect(outline.fill).toEqual(NO_PAINT)
      expect(outline.triangles).toBeNull()
      expect(outline.stroke).toEqual(solid(0, 0, 0))
    })

    it('should register gradients found in defs', async () => {
      const document = await loadSvg(path.join(dataDir, 'basic_shapes.svg'), quiet())
      expect(document.gradients.ids).toEqual(['fade', 'fade-copy'])
      const copy = document.gradient('fade-copy')
      expect(copy).toBeInstanceOf(LinearGradient)
      expect(copy?.interpolate({ x: 1, y: 0 })).toEqual({ r: 0, g: 0, b: 255, a: 255 })
    })
  })

  describe('Inheritance', () => {
    it('should inherit paint and transform from groups and restore them after', () => {
      const document = parseString(
        svg(
          '<g fill="blue" transform="translate(5 0)">' +
            '<rect width="1" height="1"/>' +
            '<rect width="1" height="1" fill="green" transform="scale(2)"/>' +
            '</g>' +
            '<rect width="1" height="1"/>'
        ),
        quiet()
      )
      const [first, second, third] = document.paths

      expect(first.fill).toEqual(solid(0, 0, 255))
      expect(first.transform.apply({ x: 0, y: 0 })).toEqual({ x: 5, y: 0 })
      expect(second.fill).toEqual(solid(0, 128, 0))
      expect(second.transform.apply({ x: 1, y: 1 })).toEqual({ x: 7, y: 2 })
      expect(third.fill).toEqual(solid(0, 0, 0))
      expect(third.transform.apply({ x: 1, y: 1 })).toEqual({ x: 1, y: 1 })
    })

    it('should multiply opacities into the paint alpha', () => {
      const document = parseString(
        svg(
          '<g opacity="0.5">' +
            '<rect width="1" height="1" fill="red" fill-opacity="0.5" stroke="blue"/>' +
            '</g>'
        ),
        quiet()
      )
      const [rect] = document.paths
      expect(rect.fill).toEqual(solid(255, 0, 0, 63))
      expect(rect.stroke).toEqual(solid(0, 0, 255, 127))
    })

    it('should let style override presentation attributes', () => {
      const document = parseString(
        svg('<rect width="1" height="1" fill="red" style="fill: blue; fill-opacity: 50%"/>'),
        quiet()
      )
      expect(document.paths[0].fill).toEqual(solid(0, 0, 255, 127))
    })

    it('should inherit paint from the root element', () => {
      const document = parseString(
        svg('<rect width="1" height="1"/>', 'width="1" height="1" fill="red"'),
        quiet()
      )
      expect(document.paths[0].fill).toEqual(solid(255, 0, 0))
    })

    it('should keep a transparent stroke when strokeFromFill is off', () => {
      const document = parseString(
        svg('<rect width="1" height="1" fill="red"/>'),
        quiet({ strokeFromFill: false })
      )
      expect(document.paths[0].stroke).toEqual(solid(0, 0, 0, 0))
    })
  })

  describe('Faults', () => {
    it('should contain faults to the offending element', async () => {
      const warn = jest.fn<(message: string) => void>()
      const document = await loadSvg(path.join(dataDir, 'faults.svg'), { warn })

      expect(document.paths.map((p) => p.id)).toEqual(['kept'])
      expect(warn.mock.calls).toEqual([
        ['Skipping <g> and its children: Invalid rotate arguments: (1 2)'],
        ['Skipping geometry of <path id="broken">: Missing parameters for L'],
        ['Skipping unsupported element <text>']
      ])
    })

    it('should skip shapes inside defs', () => {
      const document = parseString(
        svg('<defs><rect id="template" width="1" height="1"/></defs>'),
        quiet()
      )
      expect(document.paths).toHaveLength(0)
    })

    it('should keep the last path registered under an id', () => {
      const document = parseString(
        svg('<rect id="twin" width="1" height="1"/><rect id="twin" width="2" height="2"/>'),
        quiet()
      )
      expect(document.pathById('twin')).toBe(document.paths[1])
    })
  })

  describe('Viewport', () => {
    it('should size the document from the viewBox alone', () => {
      const document = parseString(svg('', 'viewBox="0 0 30 40"'), quiet())
      expect(document.width).toBe(30)
      expect(document.height).toBe(40)
      expect(document.rootTransform.toArray()).toEqual([1, 0, 0, 1, 0, 0])
    })

    it('should keep user coordinates when both a size and a viewBox are given', () => {
      const document = parseString(
        svg('<rect width="10" height="10"/>', 'width="200" height="100" viewBox="0 0 100 100"'),
        quiet()
      )
      expect(document.width).toBe(200)
      expect(document.height).toBe(100)
      expect(document.rootTransform.toArray()).toEqual([1, 0, 0, 1, 0, 0])
    })

    it('should centre the viewBox in a wider viewport when fitting is enabled', () => {
      const document = parseString(
        svg('<rect width="10" height="10"/>', 'width="200px" height="100" viewBox="0 0 100 100"'),
        quiet({ fitViewBox: true })
      )
      expect(document.width).toBe(200)
      expect(document.paths[0].transform.apply({ x: 10, y: 10 })).toEqual({ x: 60, y: 10 })
    })

    it('should stretch the viewBox when aspect ratio is not preserved', () => {
      const document = parseString(
        svg('', 'width="200" height="100" viewBox="0 0 100 100" preserveAspectRatio="none"'),
        quiet({ fitViewBox: true })
      )
      expect(document.rootTransform.apply({ x: 10, y: 10 })).toEqual({ x: 20, y: 10 })
    })

    it('should flip the y axis', () => {
      const document = parseString(
        svg('<rect width="2" height="2"/>', 'width="10" height="20"'),
        quiet({ invertY: true })
      )
      const corner = document.paths[0].worldLoops[0][2]
      expect(corner.x).toBeCloseTo(2)
      expect(corner.y).toBeCloseTo(18)
    })
  })
})
