/**
 * Entity section codec.
 *
 * Each entity is stored as a u32, an ASCII magic naming the entity type, then
 * the fields for that type with no delimiter or length. Because nothing bounds
 * the payload, an unrecognized magic cannot be skipped and aborts the decode.
 *
 * In every file seen so far the leading u32 equals the byte length of the
 * magic. It is not used to drive parsing: the magic is matched directly
 * against the known table. The writer emits the magic length.
 */

import type { ByteReader, ByteWriter } from './binary'
import { type EntityType, FormatConstants } from './constants'
import { RoomMeshError } from './errors'
import { readNumericTriple, readString, writeNumericTriple, writeString } from './strings'
import type { RoomEntity } from './types'

const asciiEncoder = new TextEncoder()

const ENTITY_MAGICS: ReadonlyArray<[EntityType, Uint8Array]> = FormatConstants.ENTITY_TYPES.map(
  (type): [EntityType, Uint8Array] => [type, asciiEncoder.encode(type)]
)

const MAX_MAGIC_LENGTH = Math.max(...ENTITY_MAGICS.map(([, magic]) => magic.length))

const PREVIEW_LIMIT = 32

function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (prefix.length > bytes.length) return false
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) return false
  }
  return true
}

function describeBytes(bytes: Uint8Array): string {
  return Array.from(bytes, b =>
    b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : `\\x${b.toString(16).padStart(2, '0')}`
  ).join('')
}

/**
 * Utility class for entity records
 */
export class EntityUtils {
  /**
   * Check whether a string is one of the known entity magics
   */
  static isEntityType(text: string): text is EntityType {
    return FormatConstants.ENTITY_TYPES.some(type => type === text)
  }

  /**
   * Group entities by type
   */
  static byType<K extends EntityType>(entities: RoomEntity[], type: K): Extract<RoomEntity, { type: K }>[] {
    return entities.filter((entity): entity is Extract<RoomEntity, { type: K }> => entity.type === type)
  }

  /**
   * Count entities per type, in the order types first appear
   */
  static countByType(entities: RoomEntity[]): Map<EntityType, number> {
    const counts = new Map<EntityType, number>()
    for (const entity of entities) {
      counts.set(entity.type, (counts.get(entity.type) ?? 0) + 1)
    }
    return counts
  }
}

/**
 * Match the upcoming bytes against the magic table and consume the match
 */
function readEntityType(reader: ByteReader, declaredLength: number): EntityType {
  for (const [type, magic] of ENTITY_MAGICS) {
    if (startsWith(reader.peekBytes(magic.length), magic)) {
      reader.skip(magic.length)
      return type
    }
  }

  const upcoming = reader.peekBytes(MAX_MAGIC_LENGTH)
  const endsInsideMagic = ENTITY_MAGICS.some(
    ([, magic]) => upcoming.length < magic.length && startsWith(magic, upcoming)
  )
  if (endsInsideMagic) {
    throw new RoomMeshError(
      'Truncated',
      `Unexpected end of data inside entity tag "${describeBytes(upcoming)}"`,
      reader.position
    )
  }

  // The declared length only widens the diagnostic preview.
  const preview = reader.peekBytes(Math.min(Math.max(declaredLength, MAX_MAGIC_LENGTH), PREVIEW_LIMIT))
  throw new RoomMeshError(
    'UnknownEntityTag',
    `Unknown entity tag "${describeBytes(preview)}", expected one of ${FormatConstants.ENTITY_TYPES.join(', ')}`,
    reader.position
  )
}

export function readEntity(reader: ByteReader): RoomEntity {
  const declaredLength = reader.readUint32()
  const type = readEntityType(reader, declaredLength)

  switch (type) {
    case 'screen': {
      const position = reader.readVec3()
      const name = readString(reader)
      return { type, position, name }
    }
    case 'waypoint':
      return { type, position: reader.readVec3() }
    case 'light': {
      const position = reader.readVec3()
      const range = reader.readFloat32()
      const color = readNumericTriple(reader)
      const intensity = reader.readFloat32()
      return { type, position, range, color, intensity }
    }
    case 'spotlight': {
      const position = reader.readVec3()
      const range = reader.readFloat32()
      const color = readNumericTriple(reader)
      const intensity = reader.readFloat32()
      const angles = readNumericTriple(reader)
      const innerConeAngle = reader.readFloat32()
      const outerConeAngle = reader.readFloat32()
      return { type, position, range, color, intensity, angles, innerConeAngle, outerConeAngle }
    }
    case 'soundemitter': {
      const position = reader.readVec3()
      const reserved0 = reader.readUint32()
      const reserved1 = reader.readFloat32()
      return { type, position, reserved0, reserved1 }
    }
    case 'playerstart': {
      const position = reader.readVec3()
      const angles = readString(reader)
      return { type, position, angles }
    }
    case 'model': {
      const name = readString(reader)
      const position = reader.readVec3()
      const rotation = reader.readVec3()
      const scale = reader.readVec3()
      return { type, name, position, rotation, scale }
    }
  }
}

export function writeEntity(writer: ByteWriter, entity: RoomEntity): void {
  const magic = asciiEncoder.encode(entity.type)
  writer.writeUint32(magic.length)
  writer.writeBytes(magic)

  switch (entity.type) {
    case 'screen':
      writer.writeVec3(entity.position)
      writeString(writer, entity.name)
      break
    case 'waypoint':
      writer.writeVec3(entity.position)
      break
    case 'light':
      writer.writeVec3(entity.position)
      writer.writeFloat32(entity.range)
      writeNumericTriple(writer, entity.color)
      writer.writeFloat32(entity.intensity)
      break
    case 'spotlight':
      writer.writeVec3(entity.position)
      writer.writeFloat32(entity.range)
      writeNumericTriple(writer, entity.color)
      writer.writeFloat32(entity.intensity)
      writeNumericTriple(writer, entity.angles)
      writer.writeFloat32(entity.innerConeAngle)
      writer.writeFloat32(entity.outerConeAngle)
      break
    case 'soundemitter':
      writer.writeVec3(entity.position)
      writer.writeUint32(entity.reserved0)
      writer.writeFloat32(entity.reserved1)
      break
    case 'playerstart':
      writer.writeVec3(entity.position)
      writeString(writer, entity.angles)
      break
    case 'model':
      writeString(writer, entity.name)
      writer.writeVec3(entity.position)
      writer.writeVec3(entity.rotation)
      writer.writeVec3(entity.scale)
      break
  }
}

export function readEntityList(reader: ByteReader): RoomEntity[] {
  const count = reader.readUint32()
  const entities: RoomEntity[] = []
  for (let i = 0; i < count; i++) {
    entities.push(readEntity(reader))
  }
  return entities
}

export function writeEntityList(writer: ByteWriter, entities: RoomEntity[]): void {
  writer.writeCount(entities)
  for (const entity of entities) {
    writeEntity(writer, entity)
  }
}
