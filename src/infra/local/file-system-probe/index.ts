import * as fs from 'fs/promises';
import { ResultAsync as RA, type ResultAsync } from 'neverthrow';
import type { FileSystemProbePort, FsProbeError, PathKind } from '../../../ports/file-system-probe.port.js';
import { errorMessage, nodeErrorCode } from '../node-error-code.js';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

export class NodeFileSystemProbe implements FileSystemProbePort {
  pathKind(path: string): ResultAsync<PathKind, FsProbeError> {
    return RA.fromPromise(
      fs.stat(path).then(
        (stats): PathKind => (stats.isFile() ? 'file' : stats.isDirectory() ? 'directory' : 'other'),
        (e: unknown): PathKind => {
          if (MISSING_CODES.has(nodeErrorCode(e) ?? '')) return 'missing';
          throw e;
        }
      ),
      (e) => mapFsError(e, path)
    );
  }
}

function mapFsError(e: unknown, path: string): FsProbeError {
  const code = nodeErrorCode(e);
  if (code === 'EACCES' || code === 'EPERM') {
    return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${path}` };
  }
  return { code: 'FS_IO_ERROR', message: `Cannot inspect ${path}: ${errorMessage(e)}` };
}
