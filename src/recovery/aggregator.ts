/**
 * Result aggregator
 *
 * Single owner of the run's ProgressState, match list and error log. Workers
 * report into it; every method applies its whole update before returning, so
 * listeners and snapshot readers never see half of an increment.
 */

import type {
  ClassificationResult,
  CopyOutcome,
  MatchResult,
  ProgressState,
  ProjectFolder,
  RecoveryEvent,
  RecoveryPhase,
} from '../types/recovery.js';

export type ProgressListener = (state: ProgressState) => void;

export function createProgressState(): ProgressState {
  return {
    phase: 'scanning',
    filesExamined: 0,
    projectFoldersFound: 0,
    matchesByKind: { ProjectFile: 0, ProjectArchive: 0, KeywordMatch: 0 },
    errorsByCategory: { enumeration: 0, header: 0, classify: 0, plan: 0, copy: 0 },
    copiesSucceeded: 0,
    copiesFailed: 0,
  };
}

function isMatch(result: ClassificationResult): result is MatchResult {
  return result.kind !== 'None' && result.basis !== undefined;
}

export class ResultAggregator {
  private readonly state: ProgressState = createProgressState();
  private readonly matchesByPath = new Map<string, MatchResult>();
  private readonly errors: RecoveryEvent[] = [];
  private readonly projectFolders = new Map<string, ProjectFolder>();
  private readonly outcomes: CopyOutcome[] = [];
  private readonly listeners = new Set<ProgressListener>();

  /**
   * Subscribe to progress updates. Returns an unsubscribe function.
   */
  onProgress(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setPhase(phase: RecoveryPhase): void {
    this.state.phase = phase;
    this.notify();
  }

  /**
   * Record one examined candidate and keep it when it matched
   *
   * @returns The match, or undefined for a None result or a path already recorded
   */
  recordClassification(result: ClassificationResult): MatchResult | undefined {
    this.state.filesExamined++;

    let accepted: MatchResult | undefined;
    if (isMatch(result) && !this.matchesByPath.has(result.path)) {
      this.matchesByPath.set(result.path, result);
      this.state.matchesByKind[result.kind]++;
      accepted = result;
    }

    this.notify();
    return accepted;
  }

  /**
   * @returns False when the folder was already recorded
   */
  recordProjectFolder(folder: ProjectFolder): boolean {
    if (this.projectFolders.has(folder.path)) return false;
    this.projectFolders.set(folder.path, folder);
    this.state.projectFoldersFound++;
    this.notify();
    return true;
  }

  recordError(event: RecoveryEvent): void {
    this.errors.push(event);
    this.state.errorsByCategory[event.category]++;
    this.notify();
  }

  recordCopy(outcome: CopyOutcome): void {
    this.outcomes.push(outcome);
    if (outcome.succeeded) {
      this.state.copiesSucceeded++;
    } else {
      this.state.copiesFailed++;
    }
    this.notify();
  }

  /**
   * Matches sorted by source path, independent of worker interleaving
   */
  getMatches(): MatchResult[] {
    return [...this.matchesByPath.values()].sort((a, b) => comparePaths(a.path, b.path));
  }

  getProjectFolders(): ProjectFolder[] {
    return [...this.projectFolders.values()].sort((a, b) => comparePaths(a.path, b.path));
  }

  getErrors(): RecoveryEvent[] {
    return [...this.errors].sort((a, b) => comparePaths(a.path, b.path) || a.category.localeCompare(b.category));
  }

  getOutcomes(): CopyOutcome[] {
    return [...this.outcomes].sort((a, b) => comparePaths(a.plan.sourcePath, b.plan.sourcePath));
  }

  get errorCount(): number {
    return this.errors.length;
  }

  /**
   * Consistent copy of the current counters
   */
  snapshot(): ProgressState {
    return {
      ...this.state,
      matchesByKind: { ...this.state.matchesByKind },
      errorsByCategory: { ...this.state.errorsByCategory },
    };
  }

  private notify(): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
