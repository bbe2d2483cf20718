/**
 * Inspect command
 * Classifies individual files without copying anything
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, normalizeKeywords } from '../../config/index.js';
import { classifyCandidate } from '../../recovery/pipeline.js';
import type { ClassificationResult } from '../../types/recovery.js';
import type { InspectCommandOptions } from '../../types/cli.js';
import { printClassification, printHeader, printWarning } from '../output.js';

/**
 * Create the inspect command
 */
export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Show how files would be classified')
    .argument('<files...>', 'Files to classify')
    .option('-k, --keywords <keywords...>', 'Filename keywords to match (case-insensitive)')
    .option('--json', 'Output as JSON')
    .action(async (files: string[], options: InspectCommandOptions) => {
      const config = await loadConfig({ cwd: process.cwd() });
      const keywords = normalizeKeywords(
        options.keywords && options.keywords.length > 0 ? options.keywords : config.recovery.keywords
      );

      const results: ClassificationResult[] = [];
      for (const file of files) {
        const filePath = path.resolve(file);
        results.push(
          await classifyCandidate(
            filePath,
            { keywords, verifyHeaders: true, headerBytes: config.recovery.header_bytes },
            undefined,
            (error) => {
              if (!options.json) {
                printWarning(`Cannot read header of ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
              }
            }
          )
        );
      }

      if (options.json) {
        console.log(JSON.stringify(results, null, 2));
        return;
      }

      printHeader('Classification');
      for (const result of results) {
        printClassification(result);
      }
    });
}
