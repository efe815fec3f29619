/**
 * MeshAdapter - Converts exported flat buffers to THREE.BufferGeometry
 *
 * The buffers are non-indexed: every three vertices form one triangle and
 * carry that triangle's facet normal.
 */

import * as THREE from 'three';
import type { FlatBuffers } from '@brickmesh/core';

/**
 * Convert flat buffers to a non-indexed THREE.BufferGeometry
 *
 * @throws when the arrays are not the same length or not whole triangles
 */
export function buffersToBufferGeometry(buffers: FlatBuffers): THREE.BufferGeometry {
  const { vertices, normals } = buffers;
  if (vertices.length !== normals.length || vertices.length % 9 !== 0) {
    throw new Error(
      `Flat buffers must hold whole triangles with one normal per vertex ` +
        `(got ${vertices.length} vertex and ${normals.length} normal values)`
    );
  }

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.Float32BufferAttribute(vertices, 3));
  geometry.setAttribute('normal', new THREE.Float32BufferAttribute(normals, 3));

  // Compute bounding box and sphere for frustum culling
  geometry.computeBoundingBox();
  geometry.computeBoundingSphere();

  return geometry;
}

/**
 * Create a THREE.Mesh from flat buffers with default material
 *
 * @param material Optional THREE.Material (defaults to MeshStandardMaterial)
 */
export function createThreeMesh(buffers: FlatBuffers, material?: THREE.Material): THREE.Mesh {
  const geometry = buffersToBufferGeometry(buffers);

  // Front faces only: the normals are expected to point outwards
  const defaultMaterial = material ?? new THREE.MeshStandardMaterial({
    color: 0xc91a09,
    metalness: 0.1,
    roughness: 0.5,
    side: THREE.FrontSide,
  });

  return new THREE.Mesh(geometry, defaultMaterial);
}

/**
 * Replace the geometry of an existing THREE.Mesh, disposing the old one
 */
export function updateThreeMesh(threeMesh: THREE.Mesh, buffers: FlatBuffers): void {
  threeMesh.geometry.dispose();
  threeMesh.geometry = buffersToBufferGeometry(buffers);
}
