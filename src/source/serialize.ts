/**
 * FileSet Snapshots
 * Persisted form of a FileSet and validation of decoded input
 */

import { ContractError } from '../error-classes.js';
import type { LineInfo } from './file.js';

// ============================================================
// SNAPSHOT TYPES
// ============================================================

export interface SerializedFile {
  readonly name: string;
  readonly base: number;
  readonly size: number;
  readonly lines: readonly number[];
  readonly infos: readonly LineInfo[];
}

/**
 * Everything position resolution depends on. The lookup cache is not part
 * of it.
 */
export interface SerializedFileSet {
  readonly base: number;
  readonly files: readonly SerializedFile[];
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown, min: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min;
}

function invalid(reason: string): ContractError {
  return new ContractError('TF-C008', { reason });
}

/** Offsets must ascend strictly and stay inside the file */
function checkOffsets(
  offsets: readonly number[],
  size: number,
  what: string
): void {
  let prev = -1;
  for (const offset of offsets) {
    if (offset <= prev || (offset >= size && offset !== 0)) {
      throw invalid(`${what} offset ${offset} out of order or past size`);
    }
    prev = offset;
  }
}

function parseLineInfo(value: unknown, where: string): LineInfo {
  if (
    !isRecord(value) ||
    !isCount(value['offset'], 0) ||
    typeof value['filename'] !== 'string' ||
    !isCount(value['line'], 0)
  ) {
    throw invalid(`${where}: malformed line info`);
  }
  return {
    offset: value['offset'],
    filename: value['filename'],
    line: value['line'],
  };
}

function parseFile(value: unknown, index: number): SerializedFile {
  const where = `files[${index}]`;
  if (!isRecord(value)) {
    throw invalid(`${where} must be an object`);
  }

  const { name, base, size, lines, infos } = value;
  if (typeof name !== 'string') {
    throw invalid(`${where}.name must be a string`);
  }
  if (!isCount(base, 1)) {
    throw invalid(`${where}.base must be an integer >= 1`);
  }
  if (!isCount(size, 0)) {
    throw invalid(`${where}.size must be an integer >= 0`);
  }
  if (!Array.isArray(lines) || !lines.every((l) => isCount(l, 0))) {
    throw invalid(`${where}.lines must be an array of offsets`);
  }
  const lineInfos = Array.isArray(infos)
    ? infos.map((info: unknown) => parseLineInfo(info, where))
    : [];

  const offsets: number[] = lines.filter((l): l is number => isCount(l, 0));
  checkOffsets(offsets, size, `${where} line`);
  checkOffsets(
    lineInfos.map((info) => info.offset),
    size,
    `${where} line info`
  );

  return { name, base, size, lines: offsets, infos: lineInfos };
}

/**
 * Validate a decoded snapshot.
 *
 * @throws ContractError (TF-C008) if the value is not a consistent snapshot
 */
export function parseSnapshot(value: unknown): SerializedFileSet {
  if (!isRecord(value)) {
    throw invalid('snapshot must be an object');
  }
  const { base, files: rawFiles } = value;
  if (!isCount(base, 1)) {
    throw invalid('base must be an integer >= 1');
  }
  if (!Array.isArray(rawFiles)) {
    throw invalid('files must be an array');
  }

  const files = rawFiles.map((file: unknown, i: number) => parseFile(file, i));

  // Files occupy disjoint ascending ranges, each followed by its EOF slot
  let next = 1;
  for (const file of files) {
    if (file.base < next) {
      throw invalid(`file "${file.name}" overlaps its predecessor`);
    }
    next = file.base + file.size + 1;
  }
  if (base < next) {
    throw invalid(`base ${base} lies inside a registered file`);
  }

  return { base, files };
}
