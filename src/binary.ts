import type { RoomMeshSource, Triangle, Vec2, Vec3 } from './common'
import { RoomMeshError } from './errors'

const U32_MAX = 0xffffffff

/**
 * Forward-only little-endian reader over caller-owned bytes.
 *
 * Every read checks the remaining length first and throws a `Truncated`
 * RoomMeshError instead of letting DataView raise a RangeError.
 */
export class ByteReader {
  private readonly view: DataView
  private readonly bytes: Uint8Array
  private pos = 0

  constructor(data: RoomMeshSource) {
    // Plain Uint8Array view; Buffer#slice would not copy
    this.bytes = data instanceof Uint8Array
      ? new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
      : new Uint8Array(data)
    this.view = new DataView(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength)
  }

  get position(): number {
    return this.pos
  }

  get byteLength(): number {
    return this.bytes.byteLength
  }

  get remaining(): number {
    return this.bytes.byteLength - this.pos
  }

  readUint8(): number {
    this.require(1, 'u8')
    return this.view.getUint8(this.pos++)
  }

  readUint32(): number {
    this.require(4, 'u32')
    const value = this.view.getUint32(this.pos, true)
    this.pos += 4
    return value
  }

  readFloat32(): number {
    this.require(4, 'f32')
    const value = this.view.getFloat32(this.pos, true)
    this.pos += 4
    return value
  }

  /**
   * Read exactly `length` bytes. The result is a copy, not a view into the source.
   */
  readBytes(length: number, what = 'byte run'): Uint8Array {
    this.require(length, what)
    const out = this.bytes.slice(this.pos, this.pos + length)
    this.pos += length
    return out
  }

  /**
   * Look at up to `length` upcoming bytes without consuming them.
   * Returns fewer bytes when the input ends sooner.
   */
  peekBytes(length: number): Uint8Array {
    return this.bytes.subarray(this.pos, Math.min(this.pos + length, this.bytes.byteLength))
  }

  skip(length: number, what = 'byte run'): void {
    this.require(length, what)
    this.pos += length
  }

  readVec2(): Vec2 {
    return [this.readFloat32(), this.readFloat32()]
  }

  readVec3(): Vec3 {
    return [this.readFloat32(), this.readFloat32(), this.readFloat32()]
  }

  readTriangle(): Triangle {
    return [this.readUint32(), this.readUint32(), this.readUint32()]
  }

  private require(length: number, what: string): void {
    if (this.pos + length > this.bytes.byteLength) {
      throw new RoomMeshError(
        'Truncated',
        `Unexpected end of data reading ${what}: needed ${length} bytes, ${this.remaining} available`,
        this.pos
      )
    }
  }
}

/**
 * Growable little-endian byte sink. Call toUint8Array() to finalize.
 */
export class ByteWriter {
  private buffer: ArrayBuffer
  private view: DataView
  private pos = 0

  constructor(initialSize = 4096) {
    this.buffer = new ArrayBuffer(Math.max(initialSize, 16))
    this.view = new DataView(this.buffer)
  }

  get position(): number {
    return this.pos
  }

  writeUint8(value: number): void {
    this.checkInteger(value, 0xff, 'u8')
    this.ensure(1)
    this.view.setUint8(this.pos++, value)
  }

  writeUint32(value: number): void {
    this.checkInteger(value, U32_MAX, 'u32')
    this.ensure(4)
    this.view.setUint32(this.pos, value, true)
    this.pos += 4
  }

  writeFloat32(value: number): void {
    this.ensure(4)
    this.view.setFloat32(this.pos, value, true)
    this.pos += 4
  }

  writeBytes(data: Uint8Array): void {
    this.ensure(data.length)
    new Uint8Array(this.buffer, this.pos, data.length).set(data)
    this.pos += data.length
  }

  writeVec2(v: Vec2): void {
    this.writeFloat32(v[0])
    this.writeFloat32(v[1])
  }

  writeVec3(v: Vec3): void {
    this.writeFloat32(v[0])
    this.writeFloat32(v[1])
    this.writeFloat32(v[2])
  }

  writeTriangle(t: Triangle): void {
    this.writeUint32(t[0])
    this.writeUint32(t[1])
    this.writeUint32(t[2])
  }

  /**
   * Count prefix for a collection, derived from its runtime length
   */
  writeCount(items: ArrayLike<unknown>): void {
    this.writeUint32(items.length)
  }

  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buffer.slice(0, this.pos))
  }

  private ensure(bytes: number): void {
    if (this.pos + bytes <= this.buffer.byteLength) return
    const newSize = Math.max(this.buffer.byteLength * 2, this.pos + bytes)
    const newBuffer = new ArrayBuffer(newSize)
    new Uint8Array(newBuffer).set(new Uint8Array(this.buffer, 0, this.pos))
    this.buffer = newBuffer
    this.view = new DataView(this.buffer)
  }

  private checkInteger(value: number, max: number, what: string): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new RoomMeshError('OutOfRange', `Cannot write ${value} as ${what}: expected an integer in 0..${max}`, this.pos)
    }
  }
}
