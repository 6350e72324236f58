/**
 * Readers and writers for the visible-geometry records: textures, vertices
 * and complex meshes.
 *
 * Complex mesh layout:
 *   texture[2]         u8 blend type, then a string path unless blend type is 0
 *   vertex_count       u32
 *   vertices           position f32x3, uv f32x2, lightmap uv f32x2, color u8x3
 *   triangle_count     u32
 *   triangles          u32x3
 */

import type { ByteReader, ByteWriter } from './binary'
import type { ByteTriple, Triangle } from './common'
import { type BlendType, FormatConstants } from './constants'
import { RoomMeshError } from './errors'
import { readString, writeString } from './strings'
import type { ComplexMesh, Texture, Vertex } from './types'

/**
 * Helpers for texture references
 */
export class TextureUtils {
  /**
   * A texture slot with nothing bound to it
   */
  static empty(): Texture {
    return { blendType: 'None' }
  }

  /**
   * Whether the texture carries a path
   */
  static hasPath(texture: Texture): texture is Extract<Texture, { path: string }> {
    return texture.blendType !== 'None'
  }

  /**
   * Wire value of a blend type
   */
  static blendTypeCode(blendType: BlendType): number {
    return FormatConstants.BLEND_TYPES.indexOf(blendType)
  }
}

export function readTexture(reader: ByteReader): Texture {
  const start = reader.position
  const code = reader.readUint8()
  const blendType: BlendType | undefined = FormatConstants.BLEND_TYPES[code]
  if (blendType === undefined) {
    throw new RoomMeshError(
      'InvalidBlendType',
      `Unknown texture blend type ${code}, expected 0..${FormatConstants.BLEND_TYPES.length - 1}`,
      start
    )
  }
  if (blendType === 'None') {
    return { blendType }
  }
  return { blendType, path: readString(reader) }
}

export function writeTexture(writer: ByteWriter, texture: Texture): void {
  writer.writeUint8(TextureUtils.blendTypeCode(texture.blendType))
  if (TextureUtils.hasPath(texture)) {
    writeString(writer, texture.path)
  }
}

export function readVertex(reader: ByteReader): Vertex {
  const position = reader.readVec3()
  const texCoords0 = reader.readVec2()
  const texCoords1 = reader.readVec2()
  const color: ByteTriple = [reader.readUint8(), reader.readUint8(), reader.readUint8()]
  return { position, texCoords: [texCoords0, texCoords1], color }
}

export function writeVertex(writer: ByteWriter, vertex: Vertex): void {
  writer.writeVec3(vertex.position)
  writer.writeVec2(vertex.texCoords[0])
  writer.writeVec2(vertex.texCoords[1])
  writer.writeUint8(vertex.color[0])
  writer.writeUint8(vertex.color[1])
  writer.writeUint8(vertex.color[2])
}

export function readComplexMesh(reader: ByteReader): ComplexMesh {
  const textures: [Texture, Texture] = [readTexture(reader), readTexture(reader)]

  const vertexCount = reader.readUint32()
  const vertices: Vertex[] = []
  for (let i = 0; i < vertexCount; i++) {
    vertices.push(readVertex(reader))
  }

  const triangleCount = reader.readUint32()
  const triangles: Triangle[] = []
  for (let i = 0; i < triangleCount; i++) {
    triangles.push(reader.readTriangle())
  }

  return { textures, vertices, triangles }
}

export function writeComplexMesh(writer: ByteWriter, mesh: ComplexMesh): void {
  for (const texture of mesh.textures) {
    writeTexture(writer, texture)
  }

  writer.writeCount(mesh.vertices)
  for (const vertex of mesh.vertices) {
    writeVertex(writer, vertex)
  }

  writer.writeCount(mesh.triangles)
  for (const triangle of mesh.triangles) {
    writer.writeTriangle(triangle)
  }
}
