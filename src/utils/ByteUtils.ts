/**
 * Low-level byte helpers shared by the codecs and storage adapters.
 */
export class ByteUtils {
  /**
   * Returns a fresh, independent copy of the given Uint8Array.
   *
   * Handles subarray views and pooled Buffers by copying only the view's
   * own byte range, not the whole backing ArrayBuffer.
   *
   * @throws {TypeError} If src is not a Uint8Array (or Buffer).
   */
  static copy(src: Uint8Array): Uint8Array {
    ByteUtils.assertUint8Array(src, "src")

    const out = new Uint8Array(src.length)
    out.set(src, 0)
    return out
  }

  /**
   * Lowercase hex, two characters per byte, no separators.
   *
   * @throws {TypeError} If bytes is not a Uint8Array (or Buffer).
   */
  static toHex(bytes: Uint8Array): string {
    ByteUtils.assertUint8Array(bytes, "bytes")

    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex")
  }

  /**
   * Wraps a Uint8Array as a Buffer over the same bytes (no copy), respecting
   * byteOffset and byteLength. `Buffer.from(view.buffer)` alone would wrap
   * the entire backing ArrayBuffer.
   *
   * @throws {TypeError} If bytes is not a Uint8Array (or Buffer).
   */
  static toBuffer(bytes: Uint8Array): Buffer {
    ByteUtils.assertUint8Array(bytes, "bytes")

    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  private static assertUint8Array(value: unknown, paramName: string): void {
    if (!(value instanceof Uint8Array)) {
      throw new TypeError(
        `ByteUtils: "${paramName}" must be a Uint8Array or Buffer. ` +
        `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}`
      )
    }
  }
}
