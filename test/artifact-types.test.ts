import { describe, it, expect } from 'vitest';
import { inferArtifactType } from '../src/artifacts/artifact-types.js';
import { ArtifactType } from '../src/types/artifact.js';

describe('inferArtifactType', () => {
  it.each([
    ['spec.md', ArtifactType.SPECIFICATION],
    ['implementation.diff', ArtifactType.DIFF],
    ['fix.patch', ArtifactType.DIFF],
    ['review.json', ArtifactType.JSON],
    ['notes.txt', ArtifactType.TEXT],
    ['build.log', ArtifactType.TEXT],
    ['main.go', ArtifactType.CODE],
    ['app.ts', ArtifactType.CODE],
    ['script.py', ArtifactType.CODE],
    ['screenshot.png', ArtifactType.BINARY],
    ['report.pdf', ArtifactType.BINARY],
    ['bundle.zip', ArtifactType.BINARY],
    ['Makefile', ArtifactType.UNKNOWN],
    ['data.xyz', ArtifactType.UNKNOWN],
  ])('should classify %s as %s', (name, expected) => {
    expect(inferArtifactType(name)).toBe(expected);
  });

  it('should ignore extension case', () => {
    expect(inferArtifactType('IMAGE.JPG')).toBe(ArtifactType.BINARY);
    expect(inferArtifactType('README.MD')).toBe(ArtifactType.SPECIFICATION);
  });

  it('should use the last extension of nested names', () => {
    expect(inferArtifactType('reports/output.test.json')).toBe(ArtifactType.JSON);
  });
});
