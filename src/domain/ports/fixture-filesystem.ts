export type PathKind = 'file' | 'directory' | 'other';

export interface PathInfo {
  kind: PathKind;
  size: number;
}

/**
 * Port for the filesystem checks the provisioner makes.
 *
 * The Node implementation lives in infrastructure/filesystem; tests substitute
 * an in-memory one to model permission failures that root would bypass.
 */
export interface IFixtureFilesystem {
  /** Describe a path, or return undefined when nothing exists there. Throws when the path cannot be examined. */
  inspect(path: string): PathInfo | undefined;
  /** Create a directory and its parents. Throws on failure. */
  createDirectory(path: string): void;
  isWritable(path: string): boolean;
}
