import { expect } from 'vitest'
import { ByteWriter } from '../binary'
import { RoomMeshError, type RoomMeshErrorCode } from '../errors'
import type { Vertex } from '../types'

/**
 * Run `fn`, expecting it to throw a RoomMeshError with the given code
 */
export function expectRoomMeshError(fn: () => unknown, code: RoomMeshErrorCode): RoomMeshError {
  try {
    fn()
  } catch (error) {
    if (RoomMeshError.is(error)) {
      expect(error.code).toBe(code)
      return error
    }
    throw error
  }
  throw new Error(`Expected a RoomMeshError with code ${code}`)
}

/**
 * Build bytes with the library's own writer
 */
export function buildBytes(build: (writer: ByteWriter) => void): Uint8Array {
  const writer = new ByteWriter()
  build(writer)
  return writer.toUint8Array()
}

export function ascii(text: string): number[] {
  return Array.from(text, c => c.charCodeAt(0))
}

export function vertex(x: number, y: number, z: number): Vertex {
  return {
    position: [x, y, z],
    texCoords: [[x, y], [0.5, 0.25]],
    color: [255, 128, 0]
  }
}
