import { describe, expect, it } from 'vitest'

import { PNG_SIGNATURE, PngStreamParser } from '../src/video/png-stream.js'

const chunk = (type: string, data: Buffer = Buffer.alloc(0)) => {
  const header = Buffer.alloc(8)
  header.writeUInt32BE(data.length, 0)
  header.write(type, 4, 'latin1')
  return Buffer.concat([header, data, Buffer.alloc(4)])
}

const fakePng = (fill: number, size = 13) =>
  Buffer.concat([PNG_SIGNATURE, chunk('IHDR', Buffer.alloc(size, fill)), chunk('IEND')])

describe('png stream parser', () => {
  it('splits concatenated images', () => {
    const first = fakePng(1)
    const second = fakePng(2)
    const parser = new PngStreamParser()

    const images = parser.push(Buffer.concat([first, second]))

    expect(images).toEqual([first, second])
    expect(parser.pendingBytes).toBe(0)
    expect(parser.discardedBytes).toBe(0)
  })

  it('assembles images delivered one byte at a time', () => {
    const first = fakePng(3)
    const second = fakePng(4)
    const stream = Buffer.concat([first, second])
    const parser = new PngStreamParser()
    const images: Buffer[] = []

    for (const byte of stream) images.push(...parser.push(Buffer.from([byte])))

    expect(images).toEqual([first, second])
  })

  it('grows past its initial buffer for large frames', () => {
    const large = fakePng(5, 200_000)
    const parser = new PngStreamParser()

    expect(parser.push(large.subarray(0, 100_000))).toEqual([])
    expect(parser.push(large.subarray(100_000))).toEqual([large])
  })

  it('skips garbage before a signature split across reads', () => {
    const image = fakePng(6)
    const stream = Buffer.concat([Buffer.alloc(10, 0x41), image])
    const parser = new PngStreamParser()

    expect(parser.push(stream.subarray(0, 13))).toEqual([])
    expect(parser.pendingBytes).toBe(7)
    expect(parser.push(stream.subarray(13))).toEqual([image])
    expect(parser.discardedBytes).toBe(10)
  })

  it('resynchronises on the next signature after a malformed chunk', () => {
    const broken = fakePng(7)
    broken.write('\u0000\u0001\u0002\u0003', 12, 'latin1')
    const good = fakePng(8)
    const parser = new PngStreamParser()

    expect(parser.push(Buffer.concat([broken, good]))).toEqual([good])
    expect(parser.discardedBytes).toBe(broken.length)
  })

  it('reports an incomplete trailing image on finish', () => {
    const parser = new PngStreamParser()
    parser.push(fakePng(9).subarray(0, 20))

    expect(parser.finish()).toBe(20)
    expect(parser.pendingBytes).toBe(0)
    expect(parser.discardedBytes).toBe(20)
  })
})
