/**
 * File Set
 * Registry of source files sharing one global offset space
 */

import { ContractError } from '../error-classes.js';
import {
  INVALID_POSITION,
  NO_POS,
  type Pos,
  type Position,
} from '../position.js';
import { searchAtOrBelow, SourceFile } from './file.js';
import { ExclusiveLock } from './lock.js';
import { parseSnapshot, type SerializedFileSet } from './serialize.js';

/**
 * A set of source files. Each file owns the global offsets
 * `[base, base + size]`; the next file starts one past that, so the EOF
 * position of every file is addressable.
 *
 * All state is guarded by one exclusive lock shared with the files, so a
 * FileSet can be handed to many scanners at once.
 */
export class FileSet {
  private readonly lock = new ExclusiveLock();
  private nextBase = 1;
  private files: SourceFile[] = [];
  private last: SourceFile | undefined;

  /** Minimum base offset the next addFile() call accepts */
  get base(): number {
    return this.lock.run('base', () => this.nextBase);
  }

  /** Number of registered files */
  get size(): number {
    return this.lock.run('size', () => this.files.length);
  }

  /**
   * Register a file. Pass `fset.base` as `base` (a negative `base` means the
   * same). Files must be added in ascending base order.
   *
   * @throws ContractError if base is below the set's base or size is negative
   */
  addFile(name: string, base: number, size: number): SourceFile {
    return this.lock.run('addFile', () => {
      const fileBase = base < 0 ? this.nextBase : base;
      if (!Number.isInteger(fileBase) || fileBase < this.nextBase) {
        throw new ContractError('TF-C002', {
          base: fileBase,
          minimum: this.nextBase,
        });
      }
      if (!Number.isInteger(size) || size < 0) {
        throw new ContractError('TF-C003', { size });
      }

      const file = new SourceFile(this.lock, { name, base: fileBase, size });
      // +1 leaves room for the EOF position of this file
      this.nextBase = fileBase + size + 1;
      this.files.push(file);
      this.last = file;
      return file;
    });
  }

  /** The file containing p, or undefined */
  file(p: Pos): SourceFile | undefined {
    if (p === NO_POS) {
      return undefined;
    }
    return this.lock.run('file', () => this.lookup(p));
  }

  /**
   * Visit files in ascending base order until fn returns false.
   * The lock is not held while fn runs.
   */
  iterate(fn: (file: SourceFile) => boolean): void {
    for (let i = 0; ; i++) {
      const file = this.lock.run('iterate', () => this.files[i]);
      if (file === undefined || !fn(file)) {
        break;
      }
    }
  }

  position(p: Pos): Position {
    return this.positionFor(p, true);
  }

  /**
   * Resolve a global Pos. With `adjusted` false, alternate position entries
   * are ignored. NO_POS and offsets outside every file resolve to the
   * invalid position.
   */
  positionFor(p: Pos, adjusted: boolean): Position {
    if (p === NO_POS) {
      return INVALID_POSITION;
    }
    return this.lock.run('position', () => {
      const file = this.lookup(p);
      return file ? file.unpack(p, p - file.base, adjusted) : INVALID_POSITION;
    });
  }

  // ------------------------------------------------------------
  // Persistence
  // ------------------------------------------------------------

  /** Hand a snapshot of the set to encode and return its result */
  write<T>(encode: (snapshot: SerializedFileSet) => T): T {
    const snapshot = this.lock.run('write', () => ({
      base: this.nextBase,
      files: this.files.map((file) => file.snapshot()),
    }));
    return encode(snapshot);
  }

  /**
   * Replace the contents of the set with a decoded snapshot. Files obtained
   * from the set before the call are detached from it afterwards.
   *
   * @throws ContractError if the decoded value is not a valid snapshot
   */
  read(decode: () => unknown): void {
    const snapshot = parseSnapshot(decode());
    this.lock.run('read', () => {
      this.nextBase = snapshot.base;
      this.files = snapshot.files.map(
        (data) => new SourceFile(this.lock, data)
      );
      this.last = undefined;
    });
  }

  // ------------------------------------------------------------
  // Lookup (lock held)
  // ------------------------------------------------------------

  private lookup(p: Pos): SourceFile | undefined {
    // Scanning is sequential within a file, so most lookups hit the cache
    const cached = this.last;
    if (cached !== undefined && cached.contains(p)) {
      return cached;
    }

    const i = searchAtOrBelow(this.files, p, (file) => file.base);
    const file = this.files[i];
    if (file !== undefined && file.contains(p)) {
      this.last = file;
      return file;
    }
    return undefined;
  }
}
