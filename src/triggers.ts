import type { ByteReader, ByteWriter } from './binary'
import type { Triangle, Vec3 } from './common'
import { readString, writeString } from './strings'
import type { SimpleMesh, TriggerBox } from './types'

export function readSimpleMesh(reader: ByteReader): SimpleMesh {
  const vertexCount = reader.readUint32()
  const vertices: Vec3[] = []
  for (let i = 0; i < vertexCount; i++) {
    vertices.push(reader.readVec3())
  }

  const triangleCount = reader.readUint32()
  const triangles: Triangle[] = []
  for (let i = 0; i < triangleCount; i++) {
    triangles.push(reader.readTriangle())
  }

  return { vertices, triangles }
}

export function writeSimpleMesh(writer: ByteWriter, mesh: SimpleMesh): void {
  writer.writeCount(mesh.vertices)
  for (const vertex of mesh.vertices) {
    writer.writeVec3(vertex)
  }

  writer.writeCount(mesh.triangles)
  for (const triangle of mesh.triangles) {
    writer.writeTriangle(triangle)
  }
}

/**
 * Read a count-prefixed list of simple meshes (the collider section, and the
 * body of every trigger box)
 */
export function readSimpleMeshList(reader: ByteReader): SimpleMesh[] {
  const count = reader.readUint32()
  const meshes: SimpleMesh[] = []
  for (let i = 0; i < count; i++) {
    meshes.push(readSimpleMesh(reader))
  }
  return meshes
}

export function writeSimpleMeshList(writer: ByteWriter, meshes: SimpleMesh[]): void {
  writer.writeCount(meshes)
  for (const mesh of meshes) {
    writeSimpleMesh(writer, mesh)
  }
}

// The name comes after the meshes on the wire.
export function readTriggerBox(reader: ByteReader): TriggerBox {
  const meshes = readSimpleMeshList(reader)
  const name = readString(reader)
  return { name, meshes }
}

export function writeTriggerBox(writer: ByteWriter, triggerBox: TriggerBox): void {
  writeSimpleMeshList(writer, triggerBox.meshes)
  writeString(writer, triggerBox.name)
}

export function readTriggerBoxList(reader: ByteReader): TriggerBox[] {
  const count = reader.readUint32()
  const triggerBoxes: TriggerBox[] = []
  for (let i = 0; i < count; i++) {
    triggerBoxes.push(readTriggerBox(reader))
  }
  return triggerBoxes
}

export function writeTriggerBoxList(writer: ByteWriter, triggerBoxes: TriggerBox[]): void {
  writer.writeCount(triggerBoxes)
  for (const triggerBox of triggerBoxes) {
    writeTriggerBox(writer, triggerBox)
  }
}
