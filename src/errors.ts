/**
 * Error model for the room mesh codec.
 *
 * Every failure the codec can produce is a RoomMeshError. The `code` tells
 * callers what went wrong; `offset` is the byte position where the failing
 * read or write started.
 */

export type RoomMeshErrorCode =
  | 'Truncated'
  | 'InvalidText'
  | 'InvalidNumericTriple'
  | 'InvalidFormatTag'
  | 'UnknownEntityTag'
  | 'InvalidBlendType'
  | 'OutOfRange'

export class RoomMeshError extends Error {
  readonly code: RoomMeshErrorCode
  readonly offset: number

  constructor(code: RoomMeshErrorCode, message: string, offset: number, options?: { cause?: unknown }) {
    super(`${message} (at byte ${offset})`, options)
    this.name = 'RoomMeshError'
    this.code = code
    this.offset = offset
  }

  /**
   * Check whether a caught value is a RoomMeshError, optionally of a given code
   */
  static is(value: unknown, code?: RoomMeshErrorCode): value is RoomMeshError {
    return value instanceof RoomMeshError && (code === undefined || value.code === code)
  }
}
