/**
 * Types for the room mesh codec
 */

import type { ByteTriple, Triangle, Vec2, Vec3 } from './common'
import type { BlendType, FormatVariant } from './constants'

/**
 * A texture reference. Textures with blend type `None` carry no path; every
 * other blend type carries exactly one.
 */
export type Texture =
  | { blendType: 'None' }
  | { blendType: Exclude<BlendType, 'None'>; path: string }

/**
 * A renderable vertex
 */
export interface Vertex {
  /**
   * World position
   */
  position: Vec3

  /**
   * Texture coordinates: slot 0 is the diffuse UV, slot 1 the lightmap UV
   */
  texCoords: [Vec2, Vec2]

  /**
   * Legacy per-vertex tint, stored as-is
   */
  color: ByteTriple
}

/**
 * Visible geometry with per-vertex UVs and two texture slots
 */
export interface ComplexMesh {
  /**
   * Slot 0 is the primary texture, slot 1 the lightmap
   */
  textures: [Texture, Texture]
  vertices: Vertex[]

  /**
   * Indices into `vertices`. The codec does not range-check them.
   */
  triangles: Triangle[]
}

/**
 * Position-only geometry used for colliders and trigger volumes
 */
export interface SimpleMesh {
  vertices: Vec3[]
  triangles: Triangle[]
}

/**
 * A named gameplay trigger volume
 */
export interface TriggerBox {
  name: string
  meshes: SimpleMesh[]
}

export interface ScreenEntity {
  type: 'screen'
  position: Vec3
  name: string
}

export interface WaypointEntity {
  type: 'waypoint'
  position: Vec3
}

export interface LightEntity {
  type: 'light'
  position: Vec3
  range: number
  color: ByteTriple
  intensity: number
}

export interface SpotlightEntity {
  type: 'spotlight'
  position: Vec3
  range: number
  color: ByteTriple
  intensity: number
  angles: ByteTriple
  innerConeAngle: number
  outerConeAngle: number
}

/**
 * Sound source. The two trailing fields have no known meaning and are
 * carried through unchanged.
 */
export interface SoundEmitterEntity {
  type: 'soundemitter'
  position: Vec3
  reserved0: number
  reserved1: number
}

export interface PlayerStartEntity {
  type: 'playerstart'
  position: Vec3

  /**
   * Stored as free text, not as a numeric triple
   */
  angles: string
}

/**
 * Decorative model instance
 */
export interface ModelEntity {
  type: 'model'
  name: string
  position: Vec3

  /**
   * Euler XYZ angles in radians
   */
  rotation: Vec3
  scale: Vec3
}

/**
 * Point-placed scene object, discriminated by its wire magic
 */
export type RoomEntity =
  | ScreenEntity
  | WaypointEntity
  | LightEntity
  | SpotlightEntity
  | SoundEmitterEntity
  | PlayerStartEntity
  | ModelEntity

/**
 * A decoded room mesh file
 */
export interface RoomMesh {
  /**
   * Set from the header tag on decode. Ignored on encode: the written tag is
   * derived from `triggerBoxes`.
   */
  formatVariant: FormatVariant
  meshes: ComplexMesh[]
  colliders: SimpleMesh[]

  /**
   * Present only on `HasTriggerBox` documents
   */
  triggerBoxes?: TriggerBox[]
  entities: RoomEntity[]
}
