export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])

const CHUNK_HEADER_BYTES = 8
const CHUNK_CRC_BYTES = 4
const INITIAL_CAPACITY = 64 * 1024
const MAX_CHUNK_BYTES = 256 * 1024 * 1024
const CHUNK_TYPE_PATTERN = /^[A-Za-z]{4}$/

/**
 * Incremental splitter for a concatenated PNG stream (ffmpeg `image2pipe`).
 *
 * Bytes are appended to one growable buffer. A cursor walks the chunk headers
 * of the image being assembled (signature, chunks, IEND), so already-read bytes
 * are never rescanned. Garbage between images, or a chunk header that cannot
 * be valid, drops bytes up to the next signature.
 */
export class PngStreamParser {
  private storage: Buffer = Buffer.alloc(INITIAL_CAPACITY)
  private length = 0
  /** Offset of the current image's signature, or -1 while searching for one. */
  private imageStart = -1
  /** Offset of the next chunk header inside the current image. */
  private cursor = 0
  private discarded = 0

  /** Bytes skipped so far because they were not part of a well-formed image. */
  get discardedBytes(): number {
    return this.discarded
  }

  /** Bytes held for an image that has not been completed yet. */
  get pendingBytes(): number {
    return this.length
  }

  push(chunk: Uint8Array): Buffer[] {
    this.append(chunk)
    const images: Buffer[] = []
    while (true) {
      if (this.imageStart < 0 && !this.findSignature(0)) break
      const image = this.advance()
      if (!image) break
      images.push(image)
    }
    return images
  }

  /** Drops any partial image; returns how many bytes were left over. */
  finish(): number {
    const leftover = this.length
    this.discarded += leftover
    this.length = 0
    this.imageStart = -1
    this.cursor = 0
    return leftover
  }

  private append(chunk: Uint8Array): void {
    const required = this.length + chunk.length
    if (required > this.storage.length) {
      let capacity = this.storage.length
      while (capacity < required) capacity *= 2
      const next = Buffer.alloc(capacity)
      this.storage.copy(next, 0, 0, this.length)
      this.storage = next
    }
    this.storage.set(chunk, this.length)
    this.length = required
  }

  private findSignature(from: number): boolean {
    const view = this.storage.subarray(0, this.length)
    const index = view.indexOf(PNG_SIGNATURE, from)
    if (index < 0) {
      // Keep a tail that may hold the first bytes of a split signature.
      const keep = Math.min(this.length, PNG_SIGNATURE.length - 1)
      this.consume(this.length - keep, true)
      return false
    }
    this.consume(index, true)
    this.imageStart = 0
    this.cursor = PNG_SIGNATURE.length
    return true
  }

  private advance(): Buffer | null {
    while (this.cursor + CHUNK_HEADER_BYTES <= this.length) {
      const dataLength = this.storage.readUInt32BE(this.cursor)
      const type = this.storage.toString('latin1', this.cursor + 4, this.cursor + 8)
      if (dataLength > MAX_CHUNK_BYTES || !CHUNK_TYPE_PATTERN.test(type)) {
        this.resync()
        if (this.imageStart < 0) return null
        continue
      }
      const chunkEnd = this.cursor + CHUNK_HEADER_BYTES + dataLength + CHUNK_CRC_BYTES
      if (chunkEnd > this.length) return null
      this.cursor = chunkEnd
      if (type === 'IEND') {
        const image = Buffer.from(this.storage.subarray(this.imageStart, chunkEnd))
        this.consume(chunkEnd, false)
        this.imageStart = -1
        this.cursor = 0
        return image
      }
    }
    return null
  }

  private resync(): void {
    this.imageStart = -1
    this.cursor = 0
    this.findSignature(1)
  }

  private consume(count: number, discard: boolean): void {
    if (count <= 0) return
    if (discard) this.discarded += count
    this.storage.copyWithin(0, count, this.length)
    this.length -= count
  }
}
