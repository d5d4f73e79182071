import type { ArtifactSpec } from '@domain/types/fixture.js';

/**
 * Port for materializing one artifact at its target path.
 *
 * Implementations write directly to `spec.targetPath` and reject when the
 * underlying tool reports failure. They never check for an existing file;
 * the provisioner decides whether a fetch is needed.
 */
export interface IArtifactFetcher {
  fetch(spec: ArtifactSpec): Promise<void>;
}
