/**
 * Document-level codec for room mesh files.
 *
 * File layout, little-endian, no padding:
 *   tag                string, "RoomMesh" or "RoomMesh.HasTriggerBox"
 *   mesh_count         u32, then complex meshes
 *   collider_count     u32, then simple meshes
 *   trigger_box_count  u32, then trigger boxes (HasTriggerBox files only)
 *   entity_count       u32, then entities
 */

import { ByteReader, ByteWriter } from './binary'
import type { RoomMeshSource } from './common'
import { FormatConstants, type FormatVariant } from './constants'
import { readEntityList, writeEntityList } from './entities'
import { RoomMeshError } from './errors'
import { readComplexMesh, writeComplexMesh } from './geometry'
import { readString, writeString } from './strings'
import { readSimpleMeshList, readTriggerBoxList, writeSimpleMeshList, writeTriggerBoxList } from './triggers'
import type { ComplexMesh, RoomEntity, RoomMesh, SimpleMesh, TriggerBox } from './types'

/**
 * Collections accepted by RoomMeshUtils.create; anything omitted is empty
 */
export interface RoomMeshParts {
  meshes?: ComplexMesh[]
  colliders?: SimpleMesh[]
  triggerBoxes?: TriggerBox[]
  entities?: RoomEntity[]
}

/**
 * Outcome of RoomMeshUtils.tryDecode
 */
export type DecodeResult =
  | { ok: true; value: RoomMesh }
  | { ok: false; error: RoomMeshError }

/**
 * Utility class for reading and writing room mesh documents
 */
export class RoomMeshUtils {
  /**
   * The format variant a document is written as: HasTriggerBox exactly when
   * it has at least one trigger box
   */
  static formatVariantOf(document: Pick<RoomMesh, 'triggerBoxes'>): FormatVariant {
    return document.triggerBoxes !== undefined && document.triggerBoxes.length > 0 ? 'HasTriggerBox' : 'Simple'
  }

  /**
   * Build a document with its format variant derived from content
   */
  static create(parts: RoomMeshParts = {}): RoomMesh {
    const document: RoomMesh = {
      formatVariant: RoomMeshUtils.formatVariantOf(parts),
      meshes: parts.meshes ?? [],
      colliders: parts.colliders ?? [],
      entities: parts.entities ?? []
    }
    if (parts.triggerBoxes !== undefined && parts.triggerBoxes.length > 0) {
      document.triggerBoxes = parts.triggerBoxes
    }
    return document
  }

  /**
   * Decode a room mesh file
   *
   * @param data Raw file bytes
   * @returns The decoded document
   * @throws RoomMeshError on malformed or truncated input
   */
  static decode(data: RoomMeshSource): RoomMesh {
    const reader = new ByteReader(data)

    const tagOffset = reader.position
    const tag = readString(reader)
    const formatVariant = FormatConstants.variantFor(tag)
    if (formatVariant === undefined) {
      throw new RoomMeshError(
        'InvalidFormatTag',
        `Invalid header tag ${JSON.stringify(tag)}, expected "${FormatConstants.SIMPLE_TAG}" or "${FormatConstants.TRIGGER_BOX_TAG}"`,
        tagOffset
      )
    }

    const meshCount = reader.readUint32()
    const meshes: ComplexMesh[] = []
    for (let i = 0; i < meshCount; i++) {
      meshes.push(readComplexMesh(reader))
    }

    const colliders = readSimpleMeshList(reader)

    const triggerBoxes = formatVariant === 'HasTriggerBox' ? readTriggerBoxList(reader) : undefined

    const entities = readEntityList(reader)

    const document: RoomMesh = { formatVariant, meshes, colliders, entities }
    if (triggerBoxes !== undefined) {
      document.triggerBoxes = triggerBoxes
    }
    return document
  }

  /**
   * Decode without throwing on malformed input. Errors other than
   * RoomMeshError still propagate.
   */
  static tryDecode(data: RoomMeshSource): DecodeResult {
    try {
      return { ok: true, value: RoomMeshUtils.decode(data) }
    } catch (error) {
      if (RoomMeshError.is(error)) {
        return { ok: false, error }
      }
      throw error
    }
  }

  /**
   * Encode a document. The header tag and every count are derived from the
   * document's collections; `formatVariant` is not consulted.
   *
   * @param document The document to encode
   * @returns The encoded file bytes
   * @throws RoomMeshError when a value cannot be represented on the wire
   */
  static encode(document: RoomMesh): Uint8Array {
    const writer = new ByteWriter()
    const formatVariant = RoomMeshUtils.formatVariantOf(document)

    writeString(writer, FormatConstants.tagFor(formatVariant))

    writer.writeCount(document.meshes)
    for (const mesh of document.meshes) {
      writeComplexMesh(writer, mesh)
    }

    writeSimpleMeshList(writer, document.colliders)

    if (formatVariant === 'HasTriggerBox' && document.triggerBoxes !== undefined) {
      writeTriggerBoxList(writer, document.triggerBoxes)
    }

    writeEntityList(writer, document.entities)

    return writer.toUint8Array()
  }
}

/**
 * Decode a room mesh file
 */
export function decodeRoomMesh(data: RoomMeshSource): RoomMesh {
  return RoomMeshUtils.decode(data)
}

/**
 * Encode a room mesh document
 */
export function encodeRoomMesh(document: RoomMesh): Uint8Array {
  return RoomMeshUtils.encode(document)
}
