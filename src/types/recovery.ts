/**
 * Recovery type definitions
 * Defines classification results, progress state, output plans and run reports
 */

import { z } from 'zod';

/**
 * What a scanned file was recognised as
 */
export const FileKindSchema = z.enum(['ProjectFile', 'ProjectArchive', 'KeywordMatch', 'None']);
export type FileKind = z.infer<typeof FileKindSchema>;

/**
 * Kinds that are forwarded past the classifier
 */
export type MatchKind = Exclude<FileKind, 'None'>;

export const MATCH_KINDS: readonly MatchKind[] = ['ProjectFile', 'ProjectArchive', 'KeywordMatch'];

/**
 * Which signal produced a classification
 */
export const MatchBasisSchema = z.enum(['Extension', 'Header', 'Keyword', 'Combination']);
export type MatchBasis = z.infer<typeof MatchBasisSchema>;

/**
 * Categories of recoverable, per-entry errors
 */
export const ErrorCategorySchema = z.enum(['enumeration', 'header', 'classify', 'plan', 'copy']);
export type ErrorCategory = z.infer<typeof ErrorCategorySchema>;

export const ERROR_CATEGORIES: readonly ErrorCategory[] = ErrorCategorySchema.options;

/**
 * Result of classifying one candidate path
 */
export interface ClassificationResult {
  readonly path: string;
  readonly kind: FileKind;
  /** Absent when kind is None */
  readonly basis?: MatchBasis;
  /** Keyword that matched, for KeywordMatch results */
  readonly keyword?: string;
}

/**
 * A classification that survived the classifier (kind is never None)
 */
export interface MatchResult extends ClassificationResult {
  readonly kind: MatchKind;
  readonly basis: MatchBasis;
}

/**
 * A recoverable error attributed to one path
 */
export interface RecoveryEvent {
  category: ErrorCategory;
  path: string;
  message: string;
  /** Node error code (EACCES, ENOENT, ...) when one is available */
  code?: string;
}

/**
 * A directory laid out like a Live project folder
 */
export interface ProjectFolder {
  path: string;
  /** Marker subdirectories found in it */
  markers: string[];
}

/**
 * Aggregated counters for one scan run
 */
export interface ProgressState {
  phase: RecoveryPhase;
  filesExamined: number;
  /** Directories holding a Live project's `Samples` or `Ableton Project Info` folder */
  projectFoldersFound: number;
  matchesByKind: Record<MatchKind, number>;
  errorsByCategory: Record<ErrorCategory, number>;
  copiesSucceeded: number;
  copiesFailed: number;
}

export type RecoveryPhase = 'scanning' | 'copying' | 'done';

/**
 * Where a match will be copied to
 */
export interface OutputPlan {
  sourcePath: string;
  destinationPath: string;
  kind: MatchKind;
}

/**
 * Terminal result of copying one planned file
 */
export interface CopyOutcome {
  plan: OutputPlan;
  succeeded: boolean;
  errorDetail?: string;
}

/**
 * Resolved configuration consumed by the recovery pipeline
 */
export interface RecoveryOptions {
  /** Absolute path of the directory (or single file) to scan */
  scanRoot: string;
  /** Absolute path recovered files are copied under */
  outputRoot: string;
  keywords: readonly string[];
  workerCount: number;
  /** Read headers even when the extension alone is conclusive */
  verifyHeaders?: boolean;
  headerBytes?: number;
  /** Skip the output root while enumerating when it sits inside the scan root */
  excludeOutputRoot?: boolean;
  /** Classify and plan without writing anything */
  dryRun?: boolean;
}

export type RecoveryOutcome = 'success' | 'partial-failure' | 'cancelled' | 'fatal-failure';

/**
 * Final summary of a recovery run
 */
export interface RecoveryReport {
  outcome: RecoveryOutcome;
  /** True when the run finished without a fatal error or cancellation */
  succeeded: boolean;
  progress: ProgressState;
  matches: MatchResult[];
  projectFolders: ProjectFolder[];
  plans: OutputPlan[];
  outcomes: CopyOutcome[];
  errors: RecoveryEvent[];
  durationMs: number;
  fatalError?: {
    code: string;
    message: string;
    path?: string;
  };
}
