export { ArtifactManager } from './manager.js';
export { inferArtifactType } from './artifact-types.js';
export * from './paths.js';
