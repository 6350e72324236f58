import { describe, expect, it } from 'vitest'
import { ByteReader } from '../binary'
import {
  readSimpleMesh,
  readSimpleMeshList,
  readTriggerBox,
  readTriggerBoxList,
  writeSimpleMesh,
  writeSimpleMeshList,
  writeTriggerBox,
  writeTriggerBoxList
} from '../triggers'
import type { SimpleMesh, TriggerBox } from '../types'
import { ascii, buildBytes, expectRoomMeshError } from './helpers'

const point: SimpleMesh = {
  vertices: [[1, 0, 2]],
  triangles: [[0, 0, 0]]
}

describe('Simple meshes', () => {
  it('should write vertices before triangles, each with its own count', () => {
    const bytes = buildBytes(writer => writeSimpleMesh(writer, point))

    expect(Array.from(bytes)).toEqual([
      1, 0, 0, 0,
      0, 0, 128, 63, 0, 0, 0, 0, 0, 0, 0, 64,
      1, 0, 0, 0,
      0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0
    ])
  })

  it('should round-trip a collider list', () => {
    const colliders: SimpleMesh[] = [
      point,
      { vertices: [], triangles: [] },
      { vertices: [[0, 0, 0], [1, 1, 1], [-2, 0.5, 8]], triangles: [[0, 1, 2], [2, 1, 0]] }
    ]
    const bytes = buildBytes(writer => writeSimpleMeshList(writer, colliders))

    expect(readSimpleMeshList(new ByteReader(bytes))).toEqual(colliders)
  })

  it('should fail with Truncated when triangles are missing', () => {
    const bytes = buildBytes(writer => writeSimpleMesh(writer, point)).subarray(0, 20)

    expectRoomMeshError(() => readSimpleMesh(new ByteReader(bytes)), 'Truncated')
  })
})

describe('Trigger boxes', () => {
  it('should write the meshes before the name', () => {
    const bytes = buildBytes(writer => writeTriggerBox(writer, { name: 'tb', meshes: [point] }))

    expect(Array.from(bytes)).toEqual([
      1, 0, 0, 0,
      1, 0, 0, 0,
      0, 0, 128, 63, 0, 0, 0, 0, 0, 0, 0, 64,
      1, 0, 0, 0,
      0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0,
      2, 0, 0, 0, ...ascii('tb')
    ])
  })

  it('should decode a trigger box with no meshes', () => {
    const bytes = new Uint8Array([0, 0, 0, 0, 4, 0, 0, 0, ...ascii('exit')])

    expect(readTriggerBox(new ByteReader(bytes))).toEqual({ name: 'exit', meshes: [] })
  })

  it('should round-trip a trigger box list in order', () => {
    const triggerBoxes: TriggerBox[] = [
      { name: 'trigger_1', meshes: [point, point] },
      { name: 'trigger_2', meshes: [] }
    ]
    const bytes = buildBytes(writer => writeTriggerBoxList(writer, triggerBoxes))
    const reader = new ByteReader(bytes)

    expect(readTriggerBoxList(reader)).toEqual(triggerBoxes)
    expect(reader.remaining).toBe(0)
  })
})
