import { extname } from 'node:path';
import { ArtifactType } from '../types/artifact.js';

/**
 * Extension lookup table for artifact type inference.
 */
const EXTENSION_TYPES: ReadonlyMap<string, ArtifactType> = new Map<string, ArtifactType>([
  ['.md', ArtifactType.SPECIFICATION],
  ['.diff', ArtifactType.DIFF],
  ['.patch', ArtifactType.DIFF],
  ['.json', ArtifactType.JSON],
  ['.txt', ArtifactType.TEXT],
  ['.log', ArtifactType.TEXT],
  ['.go', ArtifactType.CODE],
  ['.py', ArtifactType.CODE],
  ['.js', ArtifactType.CODE],
  ['.ts', ArtifactType.CODE],
  ['.tsx', ArtifactType.CODE],
  ['.java', ArtifactType.CODE],
  ['.rb', ArtifactType.CODE],
  ['.rs', ArtifactType.CODE],
  ['.png', ArtifactType.BINARY],
  ['.jpg', ArtifactType.BINARY],
  ['.jpeg', ArtifactType.BINARY],
  ['.gif', ArtifactType.BINARY],
  ['.pdf', ArtifactType.BINARY],
  ['.zip', ArtifactType.BINARY],
  ['.tar', ArtifactType.BINARY],
  ['.gz', ArtifactType.BINARY],
]);

/**
 * Infer an artifact's type from its file extension (case-insensitive).
 * Advisory only; loading never depends on it.
 */
export function inferArtifactType(name: string): ArtifactType {
  return EXTENSION_TYPES.get(extname(name).toLowerCase()) ?? ArtifactType.UNKNOWN;
}
