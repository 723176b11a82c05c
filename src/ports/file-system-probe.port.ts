import type { ResultAsync } from 'neverthrow';

export type PathKind = 'file' | 'directory' | 'other' | 'missing';

export type FsProbeError =
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_IO_ERROR'; readonly message: string };

/**
 * Port: what (if anything) lives at a path.
 * A path that does not exist is `ok('missing')`, not an error.
 */
export interface FileSystemProbePort {
  pathKind(path: string): ResultAsync<PathKind, FsProbeError>;
}
