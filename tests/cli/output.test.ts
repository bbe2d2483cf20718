/**
 * Tests for CLI output formatting
 */

import { describe, it, expect } from 'vitest';
import { formatProgress } from '../../src/cli/output.js';
import { createProgressState } from '../../src/recovery/aggregator.js';

describe('formatProgress', () => {
  it('should summarise the scan', () => {
    const state = createProgressState();
    state.filesExamined = 120;
    state.matchesByKind.ProjectFile = 3;
    state.matchesByKind.KeywordMatch = 2;
    state.errorsByCategory.enumeration = 1;

    expect(formatProgress(state)).toBe('Scanning: 120 files examined, 5 matches, 1 errors');
  });

  it('should summarise copying against the number of matches', () => {
    const state = createProgressState();
    state.phase = 'copying';
    state.matchesByKind.ProjectFile = 4;
    state.copiesSucceeded = 2;
    state.copiesFailed = 1;

    expect(formatProgress(state)).toBe('Copying 3/4 files (1 failed)');
  });
});
