/**
 * File classifier
 *
 * Decides whether a candidate is an Ableton Live set, a Live pack, or a
 * keyword-matched file from three signals: the filename extension, a short
 * prefix of the file's bytes, and the configured keyword list.
 *
 * Precedence (first match wins):
 *   1. ProjectFile    - `.als` extension, the Live set XML marker, or a ZIP
 *                       header on a file not named as a pack
 *   2. ProjectArchive - `.alp` extension
 *   3. KeywordMatch   - filename contains a keyword (case-insensitive)
 *   4. None
 */

import path from 'node:path';
import type { ClassificationResult, MatchBasis } from '../types/recovery.js';

export const PROJECT_FILE_EXTENSION = '.als';
export const PROJECT_ARCHIVE_EXTENSION = '.alp';

/** Opening element of an uncompressed Live set */
export const PROJECT_XML_MARKER = Buffer.from('<Ableton Live Set', 'latin1');

/** ZIP local file header signature ("PK\x03\x04") */
export const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export const DEFAULT_HEADER_BYTES = 256;

/** Subdirectories Live creates inside a project folder */
export const PROJECT_FOLDER_MARKERS: readonly string[] = ['Samples', 'Ableton Project Info'];

export type ExtensionSignal = 'project' | 'archive' | 'none';

/**
 * Classify a path by its extension alone
 */
export function extensionSignal(filePath: string): ExtensionSignal {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === PROJECT_FILE_EXTENSION) return 'project';
  if (ext === PROJECT_ARCHIVE_EXTENSION) return 'archive';
  return 'none';
}

/**
 * Whether the header bytes are needed to classify this path.
 * Only the project-file extension settles the kind on its own; a pack name
 * can still hide an uncompressed Live set.
 */
export function needsHeader(filePath: string): boolean {
  return extensionSignal(filePath) !== 'project';
}

export function hasProjectMarker(header: Uint8Array): boolean {
  return Buffer.from(header.buffer, header.byteOffset, header.byteLength).includes(PROJECT_XML_MARKER);
}

export function hasZipSignature(header: Uint8Array): boolean {
  if (header.length < ZIP_SIGNATURE.length) return false;
  return ZIP_SIGNATURE.every((byte, i) => header[i] === byte);
}

/**
 * Return the first keyword contained in the file name, comparing case-insensitively
 */
export function matchKeyword(filePath: string, keywords: readonly string[]): string | undefined {
  const name = path.basename(filePath).toLowerCase();
  return keywords.find((keyword) => keyword.length > 0 && name.includes(keyword.toLowerCase()));
}

function basisFor(byExtension: boolean, byHeader: boolean): MatchBasis {
  if (byExtension && byHeader) return 'Combination';
  return byExtension ? 'Extension' : 'Header';
}

/**
 * Classify a file.
 *
 * @param filePath - Path of the candidate
 * @param header - Leading bytes of the file, or undefined when they were not read
 * @param keywords - Case-insensitive filename substrings
 */
export function classify(
  filePath: string,
  header: Uint8Array | undefined,
  keywords: readonly string[]
): ClassificationResult {
  const ext = extensionSignal(filePath);
  const xml = header !== undefined && hasProjectMarker(header);
  const zip = header !== undefined && hasZipSignature(header);

  // A ZIP header only counts towards a project file when the name doesn't say "pack"
  const projectByHeader = xml || (zip && ext !== 'archive');
  if (ext === 'project' || projectByHeader) {
    return { path: filePath, kind: 'ProjectFile', basis: basisFor(ext === 'project', projectByHeader) };
  }

  if (ext === 'archive') {
    return { path: filePath, kind: 'ProjectArchive', basis: basisFor(true, zip) };
  }

  const keyword = keywords.length > 0 ? matchKeyword(filePath, keywords) : undefined;
  if (keyword !== undefined) {
    return { path: filePath, kind: 'KeywordMatch', basis: 'Keyword', keyword };
  }

  return { path: filePath, kind: 'None' };
}
