import { promises as fs } from 'fs';
import type { ArtifactEntryType } from '../types/index.js';
import { ArtifactProbeError } from './errors.js';

/**
 * Read-only file system probes
 */

export type ProbeOutcome =
  | { status: 'present' }
  | { status: 'missing' }
  | { status: 'error'; error: ArtifactProbeError };

function isMissingEntryError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

/**
 * Check that a path exists and is of the expected entry type.
 * A missing entry (or one of the wrong type) is "missing"; any other failure
 * (permissions, I/O) is reported as an ArtifactProbeError instead of thrown.
 */
export async function probeEntry(path: string, expect: ArtifactEntryType): Promise<ProbeOutcome> {
  try {
    const stats = await fs.stat(path);
    const matches = expect === 'directory' ? stats.isDirectory() : stats.isFile();
    return matches ? { status: 'present' } : { status: 'missing' };
  } catch (error) {
    if (isMissingEntryError(error)) {
      return { status: 'missing' };
    }
    return { status: 'error', error: new ArtifactProbeError(path, error) };
  }
}
