/**
 * The two string encodings used throughout the format.
 *
 * - Length-prefixed string: u32 byte length, then that many UTF-8 bytes.
 * - Numeric triple: three u8 values written as "a b c" through the
 *   length-prefixed encoding. Light colors and spotlight angles use it.
 */

import type { ByteReader, ByteWriter } from './binary'
import type { ByteTriple } from './common'
import { RoomMeshError } from './errors'

// ignoreBOM keeps a leading U+FEFF in the output instead of stripping it
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })
const utf8Encoder = new TextEncoder()

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/
const U8_TOKEN = /^\+?[0-9]+$/

/**
 * Read a length-prefixed UTF-8 string
 */
export function readString(reader: ByteReader): string {
  const start = reader.position
  const length = reader.readUint32()
  const bytes = reader.readBytes(length, 'string payload')
  try {
    return utf8Decoder.decode(bytes)
  } catch (error) {
    throw new RoomMeshError('InvalidText', `String of ${length} bytes is not valid UTF-8`, start, { cause: error })
  }
}

/**
 * Write a length-prefixed UTF-8 string. The length is always taken from the
 * encoded bytes.
 */
export function writeString(writer: ByteWriter, value: string): void {
  if (LONE_SURROGATE.test(value)) {
    throw new RoomMeshError('InvalidText', `String ${JSON.stringify(value)} contains an unpaired surrogate`, writer.position)
  }
  const bytes = utf8Encoder.encode(value)
  writer.writeUint32(bytes.length)
  writer.writeBytes(bytes)
}

function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 255
}

/**
 * Format three u8 values as space-separated decimal text
 *
 * @param offset Byte offset reported if a component is not a u8
 */
export function formatNumericTriple(triple: ByteTriple, offset = 0): string {
  if (!triple.every(isByte)) {
    throw new RoomMeshError('InvalidNumericTriple', `Cannot format [${triple.join(', ')}] as a numeric triple`, offset)
  }
  return triple.join(' ')
}

/**
 * Parse "a b c" into three u8 values. Returns undefined when the text is not
 * exactly three space-separated u8 tokens.
 */
export function parseNumericTriple(text: string): ByteTriple | undefined {
  const tokens = text.split(' ')
  if (tokens.length !== 3) return undefined

  const values: number[] = []
  for (const token of tokens) {
    if (!U8_TOKEN.test(token)) return undefined
    const value = Number.parseInt(token, 10)
    if (value > 255) return undefined
    values.push(value)
  }
  return [values[0], values[1], values[2]]
}

export function readNumericTriple(reader: ByteReader): ByteTriple {
  const start = reader.position
  const text = readString(reader)
  const triple = parseNumericTriple(text)
  if (!triple) {
    throw new RoomMeshError('InvalidNumericTriple', `Expected three space-separated u8 values, found ${JSON.stringify(text)}`, start)
  }
  return triple
}

export function writeNumericTriple(writer: ByteWriter, triple: ByteTriple): void {
  writeString(writer, formatNumericTriple(triple, writer.position))
}
