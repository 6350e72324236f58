/**
 * Two-component float vector (texture coordinates)
 */
export type Vec2 = [number, number]

/**
 * Three-component float vector (positions, rotations, scales)
 */
export type Vec3 = [number, number, number]

/**
 * Three u32 vertex indices forming one triangle
 */
export type Triangle = [number, number, number]

/**
 * Three u8 values (vertex tints, light colors, spotlight angles)
 */
export type ByteTriple = [number, number, number]

/**
 * Bytes accepted by the decoder
 */
export type RoomMeshSource = ArrayBuffer | Uint8Array
