#!/usr/bin/env node
/**
 * session-salvage CLI
 * Recovers lost Ableton Live project files from a directory tree
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
