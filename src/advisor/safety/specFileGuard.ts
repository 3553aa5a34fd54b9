/**
 * Spec File Guard
 *
 * Snapshots spec files before analysis and verifies afterwards that none of
 * them changed. The advisor only reads profiles; any change is a violation.
 */

import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';
import { AdvisorErrorFactory } from '../errors/types';
import { createComponentLogger } from '../../shared/logger';

const log = createComponentLogger('spec-file-guard');

export interface FileFingerprint {
  path: string;
  exists: boolean;
  size: number;
  sha256: string;
}

async function fingerprint(path: string): Promise<FileFingerprint> {
  try {
    const info = await stat(path);
    const content = await readFile(path);
    return {
      path,
      exists: true,
      size: info.size,
      sha256: createHash('sha256').update(content).digest('hex')
    };
  } catch (error) {
    if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') {
      return { path, exists: false, size: 0, sha256: '' };
    }
    throw error;
  }
}

export class SpecFileGuard {
  private constructor(private readonly snapshot: FileFingerprint[]) {}

  /**
   * Record the current state of the given files
   */
  static async capture(paths: readonly string[]): Promise<SpecFileGuard> {
    const unique = [...new Set(paths)];
    const snapshot = await Promise.all(unique.map(fingerprint));
    log.debug({ files: unique.length }, 'Spec files captured');
    return new SpecFileGuard(snapshot);
  }

  get files(): string[] {
    return this.snapshot.map(f => f.path);
  }

  /**
   * Paths whose existence, size or content differ from the snapshot
   */
  async changedFiles(): Promise<string[]> {
    const current = await Promise.all(this.snapshot.map(f => fingerprint(f.path)));
    return current
      .filter((now, i) => {
        const before = this.snapshot[i];
        return now.exists !== before.exists || now.size !== before.size || now.sha256 !== before.sha256;
      })
      .map(f => f.path);
  }

  /**
   * Throws SAFETY_VIOLATION if any captured file changed
   */
  async verify(): Promise<void> {
    const changed = await this.changedFiles();
    if (changed.length > 0) {
      throw AdvisorErrorFactory.safetyViolation(changed);
    }
  }
}
