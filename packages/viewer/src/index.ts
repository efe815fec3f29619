/**
 * @brickmesh/viewer - three.js rendering of flattened parts
 */

export { buffersToBufferGeometry, createThreeMesh, updateThreeMesh } from './MeshAdapter.js';
