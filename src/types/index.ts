/**
 * Central type exports
 */

// Recovery types
export {
  FileKindSchema,
  MatchBasisSchema,
  ErrorCategorySchema,
  MATCH_KINDS,
  ERROR_CATEGORIES,
  type FileKind,
  type MatchKind,
  type MatchBasis,
  type ErrorCategory,
  type ClassificationResult,
  type MatchResult,
  type ProjectFolder,
  type RecoveryEvent,
  type ProgressState,
  type RecoveryPhase,
  type OutputPlan,
  type CopyOutcome,
  type RecoveryOptions,
  type RecoveryOutcome,
  type RecoveryReport,
} from './recovery.js';

// CLI types
export {
  EXIT_CODES,
  type RecoverCommandOptions,
  type InspectCommandOptions,
  type ExitCode,
} from './cli.js';
