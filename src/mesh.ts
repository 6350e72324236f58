import * as THREE from 'three'
import type { Triangle, Vec3 } from './common'
import type { ComplexMesh, RoomMesh, SimpleMesh, Vertex } from './types'

/**
 * Axis-aligned bounds
 */
export interface BoundingBox {
  min: Vec3
  max: Vec3
}

/**
 * Positions are accepted either as bare tuples or as full vertices
 */
export type PositionSource = ReadonlyArray<Vertex | Vec3>

/**
 * Flat typed-array view of a complex mesh, ready for GPU upload.
 * No axis, scale or UV convention is applied.
 */
export interface ComplexMeshArrays {
  /**
   * Positions, 3 floats per vertex
   */
  vertices: Float32Array

  /**
   * Triangle indices, 3 per triangle
   */
  indices: Uint32Array

  /**
   * Smooth vertex normals, 3 floats per vertex
   */
  normals: Float32Array

  /**
   * Diffuse texture coordinates, 2 floats per vertex
   */
  uvs: Float32Array

  /**
   * Lightmap texture coordinates, 2 floats per vertex
   */
  lightmapUvs: Float32Array

  /**
   * Legacy per-vertex tint, 3 bytes per vertex
   */
  colors: Uint8Array
}

/**
 * Flat typed-array view of a collision mesh
 */
export interface SimpleMeshArrays {
  vertices: Float32Array
  indices: Uint32Array
  normals: Float32Array
}

function positionOf(point: Vertex | Vec3): Vec3 {
  return Array.isArray(point) ? point : point.position
}

/**
 * Derived-geometry utilities over decoded records
 */
export class MeshUtils {
  /**
   * Componentwise min/max over positions. An empty input gives
   * min = (+Inf, +Inf, +Inf) and max = (-Inf, -Inf, -Inf); check the vertex
   * count separately when "has geometry" matters.
   */
  static getBoundingBox(points: PositionSource): BoundingBox {
    const box = new THREE.Box3()
    const point = new THREE.Vector3()
    for (const p of points) {
      box.expandByPoint(point.fromArray(positionOf(p)))
    }
    return {
      min: [box.min.x, box.min.y, box.min.z],
      max: [box.max.x, box.max.y, box.max.z]
    }
  }

  /**
   * Like getBoundingBox, but undefined when there are no positions
   */
  static calculateBounds(points: PositionSource): BoundingBox | undefined {
    return points.length === 0 ? undefined : MeshUtils.getBoundingBox(points)
  }

  /**
   * Smooth per-vertex normals.
   *
   * Each triangle's face normal (v1 - v0) x (v2 - v0) is added, unnormalized,
   * to its three vertices, so larger faces weigh more. Each sum is then scaled
   * to unit length. A vertex no triangle references keeps (0, 0, 0).
   *
   * @throws RangeError when a triangle references a missing vertex
   */
  static computeVertexNormals(points: PositionSource, triangles: ReadonlyArray<Triangle>): Vec3[] {
    const positions = points.map(positionOf)
    const sums = positions.map(() => new THREE.Vector3())

    const a = new THREE.Vector3()
    const b = new THREE.Vector3()
    const c = new THREE.Vector3()
    const edge1 = new THREE.Vector3()
    const edge2 = new THREE.Vector3()
    const face = new THREE.Vector3()

    triangles.forEach((triangle, t) => {
      for (const index of triangle) {
        if (!Number.isInteger(index) || index < 0 || index >= positions.length) {
          throw new RangeError(`Triangle ${t} references vertex ${index}, but there are ${positions.length} vertices`)
        }
      }
      const [i0, i1, i2] = triangle
      a.fromArray(positions[i0])
      b.fromArray(positions[i1])
      c.fromArray(positions[i2])

      edge1.subVectors(b, a)
      edge2.subVectors(c, a)
      face.crossVectors(edge1, edge2)

      sums[i0].add(face)
      sums[i1].add(face)
      sums[i2].add(face)
    })

    // Vector3.normalize leaves a zero vector as-is
    return sums.map((sum): Vec3 => {
      sum.normalize()
      return [sum.x, sum.y, sum.z]
    })
  }

  /**
   * Flatten a complex mesh into typed arrays
   */
  static toArrays(mesh: ComplexMesh): ComplexMeshArrays {
    const count = mesh.vertices.length
    const vertices = new Float32Array(count * 3)
    const uvs = new Float32Array(count * 2)
    const lightmapUvs = new Float32Array(count * 2)
    const colors = new Uint8Array(count * 3)

    mesh.vertices.forEach((vertex, i) => {
      vertices.set(vertex.position, i * 3)
      uvs.set(vertex.texCoords[0], i * 2)
      lightmapUvs.set(vertex.texCoords[1], i * 2)
      colors.set(vertex.color, i * 3)
    })

    return {
      vertices,
      indices: MeshUtils.flattenTriangles(mesh.triangles),
      normals: MeshUtils.flattenVectors(MeshUtils.computeVertexNormals(mesh.vertices, mesh.triangles)),
      uvs,
      lightmapUvs,
      colors
    }
  }

  /**
   * Flatten a collider or trigger-box mesh into typed arrays
   */
  static toSimpleArrays(mesh: SimpleMesh): SimpleMeshArrays {
    return {
      vertices: MeshUtils.flattenVectors(mesh.vertices),
      indices: MeshUtils.flattenTriangles(mesh.triangles),
      normals: MeshUtils.flattenVectors(MeshUtils.computeVertexNormals(mesh.vertices, mesh.triangles))
    }
  }

  /**
   * Total number of visible triangles in a document
   */
  static getTriangleCount(document: Pick<RoomMesh, 'meshes'>): number {
    return document.meshes.reduce((acc, mesh) => acc + mesh.triangles.length, 0)
  }

  private static flattenVectors(vectors: ReadonlyArray<Vec3>): Float32Array {
    const out = new Float32Array(vectors.length * 3)
    vectors.forEach((v, i) => out.set(v, i * 3))
    return out
  }

  private static flattenTriangles(triangles: ReadonlyArray<Triangle>): Uint32Array {
    const out = new Uint32Array(triangles.length * 3)
    triangles.forEach((t, i) => out.set(t, i * 3))
    return out
  }
}
