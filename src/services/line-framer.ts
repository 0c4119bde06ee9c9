/**
 * Line framer for the transmitter's CDC text stream.
 *
 * The device terminates every line with CRLF, but reads arrive in arbitrary chunks:
 * one read may hold several lines, none, or half of one. The framer accumulates raw
 * bytes and hands back only complete lines.
 */

/** Byte value of '\n' */
const LF = 0x0a
/** Byte value of '\r' */
const CR = 0x0d

/**
 * Accumulating newline splitter.
 *
 * Splitting happens on bytes before decoding, so a multi-byte UTF-8 character split
 * across two reads is decoded intact. Decoding is permissive: invalid sequences become
 * U+FFFD instead of failing.
 */
export class LineFramer {
  private buffer: Buffer = Buffer.alloc(0)

  /**
   * Feed newly read bytes.
   * @param data - Raw chunk from the serial link
   * @returns Complete lines in arrival order, terminator and one trailing CR stripped
   */
  feed(data: Buffer): string[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(data) : Buffer.concat([this.buffer, data])

    const lines: string[] = []
    let start = 0
    let endIdx = this.buffer.indexOf(LF, start)

    while (endIdx !== -1) {
      let lineEnd = endIdx
      if (lineEnd > start && this.buffer[lineEnd - 1] === CR) {
        lineEnd -= 1
      }
      lines.push(this.buffer.toString('utf8', start, lineEnd))
      start = endIdx + 1
      endIdx = this.buffer.indexOf(LF, start)
    }

    // Keep the unterminated remainder for the next feed
    if (start > 0) {
      this.buffer = this.buffer.subarray(start)
    }

    return lines
  }

  /**
   * Bytes held back waiting for a terminator.
   */
  getBufferedByteCount(): number {
    return this.buffer.length
  }
}
