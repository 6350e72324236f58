#!/usr/bin/env node
/**
 * Script to decode room mesh files and print what they contain.
 *
 * Usage: tsx scripts/inspect-room-mesh.ts <file-or-directory>...
 * Directories are scanned (non-recursively) for .rmesh files.
 */

import * as fs from 'fs'
import * as path from 'path'
import { EntityUtils, MeshUtils, RoomMeshUtils, TextureUtils, type RoomMesh, type Vec3 } from '../src/index'

const ROOM_MESH_EXT = '.rmesh'

/**
 * Expand the command-line arguments into a list of files
 */
function collectFiles(args: string[]): string[] {
  const files: string[] = []
  for (const arg of args) {
    const resolved = path.resolve(arg)
    if (fs.statSync(resolved).isDirectory()) {
      files.push(...fs.readdirSync(resolved)
        .filter(file => file.toLowerCase().endsWith(ROOM_MESH_EXT))
        .map(file => path.join(resolved, file)))
    } else {
      files.push(resolved)
    }
  }
  return files
}

function formatVec3(v: Vec3): string {
  return `(${v.map(n => n.toFixed(2)).join(', ')})`
}

function printDocument(document: RoomMesh): void {
  console.log(`  Format: ${document.formatVariant}`)
  console.log(`  Meshes: ${document.meshes.length}`)

  document.meshes.forEach((mesh, index) => {
    const textures = mesh.textures
      .filter(TextureUtils.hasPath)
      .map(texture => `${texture.path} [${texture.blendType}]`)
    console.log(`    Mesh ${index}: ${mesh.vertices.length} vertices, ${mesh.triangles.length} triangles`)
    for (const texture of textures) {
      console.log(`      Texture: ${texture}`)
    }
  })

  const bounds = MeshUtils.calculateBounds(document.meshes.flatMap(mesh => mesh.vertices))
  if (bounds) {
    console.log(`  Bounds: ${formatVec3(bounds.min)} .. ${formatVec3(bounds.max)}`)
  }
  console.log(`  Triangles: ${MeshUtils.getTriangleCount(document)}`)
  console.log(`  Colliders: ${document.colliders.length}`)

  if (document.triggerBoxes) {
    console.log(`  Trigger boxes: ${document.triggerBoxes.length}`)
    for (const triggerBox of document.triggerBoxes) {
      console.log(`    ${triggerBox.name}: ${triggerBox.meshes.length} meshes`)
    }
  }

  console.log(`  Entities: ${document.entities.length}`)
  for (const [type, count] of EntityUtils.countByType(document.entities)) {
    console.log(`    ${type}: ${count}`)
  }
}

/**
 * Decode and print every file, returning whether all of them decoded
 */
function inspectFiles(files: string[]): boolean {
  const results: { success: number, failure: number, errors: { file: string, error: string }[] } = {
    success: 0,
    failure: 0,
    errors: []
  }

  for (const file of files) {
    const filename = path.basename(file)
    process.stdout.write(`Decoding ${filename}... `)

    const result = RoomMeshUtils.tryDecode(fs.readFileSync(file))
    if (result.ok) {
      process.stdout.write('✓\n')
      printDocument(result.value)
      results.success++
    } else {
      process.stdout.write('✗\n')
      console.error(`  Error [${result.error.code}]: ${result.error.message}`)
      results.failure++
      results.errors.push({ file: filename, error: result.error.message })
    }
  }

  console.log('\nSummary:')
  console.log(`Total files: ${files.length}`)
  console.log(`Successful: ${results.success}`)
  console.log(`Failed: ${results.failure}`)

  if (results.errors.length > 0) {
    console.log('\nErrors:')
    for (const { file, error } of results.errors) {
      console.log(`  ${file}: ${error}`)
    }
  }

  return results.failure === 0
}

const args = process.argv.slice(2)
if (args.length === 0) {
  console.error('Usage: inspect-room-mesh <file-or-directory>...')
  process.exitCode = 1
} else {
  try {
    process.exitCode = inspectFiles(collectFiles(args)) ? 0 : 1
  } catch (error) {
    console.error('Error inspecting files:', error)
    process.exitCode = 1
  }
}
