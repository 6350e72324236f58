import { describe, expect, it } from 'vitest'
import { ByteReader, ByteWriter } from '../binary'
import {
  formatNumericTriple,
  parseNumericTriple,
  readNumericTriple,
  readString,
  writeNumericTriple,
  writeString
} from '../strings'
import { ascii, buildBytes, expectRoomMeshError } from './helpers'

describe('Length-prefixed strings', () => {
  it('should write a u32 byte length followed by the UTF-8 bytes', () => {
    const bytes = buildBytes(writer => writeString(writer, 'RoomMesh'))

    expect(Array.from(bytes)).toEqual([8, 0, 0, 0, ...ascii('RoomMesh')])
  })

  it('should count bytes, not characters', () => {
    const bytes = buildBytes(writer => writeString(writer, 'héllo'))

    expect(Array.from(bytes.subarray(0, 4))).toEqual([6, 0, 0, 0])
    expect(readString(new ByteReader(bytes))).toBe('héllo')
  })

  it('should read the empty string', () => {
    const reader = new ByteReader(new Uint8Array([0, 0, 0, 0]))

    expect(readString(reader)).toBe('')
    expect(reader.remaining).toBe(0)
  })

  it('should keep a leading byte order mark', () => {
    const reader = new ByteReader(new Uint8Array([3, 0, 0, 0, 0xef, 0xbb, 0xbf]))

    expect(readString(reader)).toBe('\uFEFF')
  })

  it('should fail with InvalidText on bytes that are not UTF-8', () => {
    const reader = new ByteReader(new Uint8Array([2, 0, 0, 0, 0xff, 0xfe]))

    const error = expectRoomMeshError(() => readString(reader), 'InvalidText')
    expect(error.offset).toBe(0)
    expect(error.cause).toBeInstanceOf(TypeError)
  })

  it('should fail with Truncated when the declared length exceeds the input', () => {
    const reader = new ByteReader(new Uint8Array([10, 0, 0, 0, 0x41]))

    const error = expectRoomMeshError(() => readString(reader), 'Truncated')
    expect(error.offset).toBe(4)
  })

  it('should refuse to write unpaired surrogates', () => {
    expectRoomMeshError(() => buildBytes(writer => writeString(writer, 'a\uD800b')), 'InvalidText')
  })

  it('should write paired surrogates as one four-byte sequence', () => {
    const bytes = buildBytes(writer => writeString(writer, '\u{1F600}'))

    expect(Array.from(bytes)).toEqual([4, 0, 0, 0, 0xf0, 0x9f, 0x98, 0x80])
  })
})

describe('Numeric triples', () => {
  it('should encode (255, 0, 128) as the string "255 0 128"', () => {
    const bytes = buildBytes(writer => writeNumericTriple(writer, [255, 0, 128]))

    expect(Array.from(bytes)).toEqual([9, 0, 0, 0, ...ascii('255 0 128')])
    expect(readNumericTriple(new ByteReader(bytes))).toEqual([255, 0, 128])
  })

  it('should format and parse the text form', () => {
    expect(formatNumericTriple([1, 22, 255])).toBe('1 22 255')
    expect(parseNumericTriple('1 22 255')).toEqual([1, 22, 255])
    expect(parseNumericTriple('007 10 0')).toEqual([7, 10, 0])
    expect(parseNumericTriple('+1 2 +3')).toEqual([1, 2, 3])
  })

  it('should reject text that is not exactly three u8 tokens', () => {
    expect(parseNumericTriple('1 2')).toBeUndefined()
    expect(parseNumericTriple('1 2 3 4')).toBeUndefined()
    expect(parseNumericTriple('1  2 3')).toBeUndefined()
    expect(parseNumericTriple('256 0 0')).toBeUndefined()
    expect(parseNumericTriple('-1 0 0')).toBeUndefined()
    expect(parseNumericTriple('+ 0 0')).toBeUndefined()
    expect(parseNumericTriple('a b c')).toBeUndefined()
    expect(parseNumericTriple('1.5 0 0')).toBeUndefined()
    expect(parseNumericTriple('')).toBeUndefined()
  })

  it('should fail with InvalidNumericTriple on malformed stored text', () => {
    const bytes = buildBytes(writer => writeString(writer, '255 0'))

    const error = expectRoomMeshError(() => readNumericTriple(new ByteReader(bytes)), 'InvalidNumericTriple')
    expect(error.message).toBe('Expected three space-separated u8 values, found "255 0" (at byte 0)')
  })

  it('should refuse to encode components that are not u8', () => {
    expectRoomMeshError(() => buildBytes(writer => writeNumericTriple(writer, [256, 0, 0])), 'InvalidNumericTriple')
    expectRoomMeshError(() => buildBytes(writer => writeNumericTriple(writer, [1.5, 0, 0])), 'InvalidNumericTriple')
    expectRoomMeshError(() => formatNumericTriple([0, -1, 0]), 'InvalidNumericTriple')
  })

  it('should report the writer position when encoding fails', () => {
    const writer = new ByteWriter()
    writer.writeUint32(0)

    const error = expectRoomMeshError(() => writeNumericTriple(writer, [0, 0, 300]), 'InvalidNumericTriple')
    expect(error.offset).toBe(4)
    expect(error.message).toBe('Cannot format [0, 0, 300] as a numeric triple (at byte 4)')
    expect(writer.position).toBe(4)
  })
})
