/**
 * Room Mesh Library
 *
 * Decoder and encoder for the binary RoomMesh scene format, plus the
 * derived-geometry helpers consumers need (bounds, vertex normals, flat arrays).
 */

// Export types
export type * from './types'
export type { ByteTriple, RoomMeshSource, Triangle, Vec2, Vec3 } from './common'
export type { BlendType, EntityType, FormatVariant } from './constants'

// Export codec entry points
export { RoomMeshUtils, decodeRoomMesh, encodeRoomMesh } from './room-mesh'
export type { DecodeResult, RoomMeshParts } from './room-mesh'
export { RoomMeshError } from './errors'
export type { RoomMeshErrorCode } from './errors'

// Export utility classes
export { FormatConstants } from './constants'
export { ByteReader, ByteWriter } from './binary'
export { TextureUtils } from './geometry'
export { EntityUtils } from './entities'
export { MeshUtils } from './mesh'
export type { BoundingBox, ComplexMeshArrays, PositionSource, SimpleMeshArrays } from './mesh'
export { formatNumericTriple, parseNumericTriple, readNumericTriple, readString, writeNumericTriple, writeString } from './strings'
