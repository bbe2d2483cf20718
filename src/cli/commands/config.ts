/**
 * Config command
 * Manage CLI configuration
 */

import { Command } from 'commander';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { stringify as stringifyYaml } from 'yaml';
import { loadConfig, getConfigPath, getConfigValue } from '../../config/index.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAMES } from '../../config/defaults.js';
import {
  printHeader,
  printSection,
  printSuccess,
  printError,
  printInfo,
  printKeyValue,
} from '../output.js';

interface JsonOption {
  json?: boolean;
}

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Manage CLI configuration');

  // Show current config
  config
    .command('show')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption) => {
      const loadedConfig = await loadConfig({ cwd: process.cwd() });
      const configPath = getConfigPath();

      if (options.json) {
        console.log(JSON.stringify(loadedConfig, null, 2));
        return;
      }

      printHeader('Current Configuration');

      if (configPath) {
        printInfo(`Config file: ${configPath}`);
      } else {
        printInfo('Using default configuration');
      }

      printConfigSection('Recovery', loadedConfig.recovery);
      printConfigSection('Output', loadedConfig.output);
    });

  // Show defaults
  config
    .command('defaults')
    .description('Show default configuration values')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      if (options.json) {
        console.log(JSON.stringify(DEFAULT_CONFIG, null, 2));
        return;
      }

      printHeader('Default Configuration');

      printConfigSection('Recovery', DEFAULT_CONFIG.recovery);
      printConfigSection('Output', DEFAULT_CONFIG.output);
    });

  // Get a specific config value
  config
    .command('get')
    .description('Get a specific configuration value')
    .argument('<key>', 'Configuration key (e.g., recovery.workers)')
    .action(async (key: string) => {
      const loadedConfig = await loadConfig({ cwd: process.cwd() });
      const value = getConfigValue(loadedConfig, key);

      if (value === undefined) {
        printError(`Configuration key not found: ${key}`);
        process.exitCode = 1;
        return;
      }

      if (typeof value === 'object') {
        console.log(JSON.stringify(value, null, 2));
      } else {
        console.log(String(value));
      }
    });

  // Show config file path
  config
    .command('path')
    .description('Show configuration file path')
    .action(async () => {
      await loadConfig({ cwd: process.cwd() });
      const configPath = getConfigPath();

      if (configPath) {
        console.log(configPath);
      } else {
        printInfo('No configuration file found');
        printInfo(`Create one at: ${CONFIG_FILE_NAMES.slice(0, 3).join(', ')}`);
      }
    });

  // Init config file
  config
    .command('init')
    .description('Create a configuration file in the current directory')
    .action(async () => {
      const filepath = path.join(process.cwd(), '.salvagerc.yaml');

      try {
        await fs.writeFile(filepath, stringifyYaml(DEFAULT_CONFIG), { encoding: 'utf-8', flag: 'wx' });
        printSuccess(`Created configuration file: ${filepath}`);
      } catch (error) {
        printError(error instanceof Error ? error.message : 'Failed to create config file');
        process.exitCode = 1;
      }
    });

  return config;
}

/**
 * Print a configuration section
 */
function printConfigSection(name: string, section: Record<string, unknown>): void {
  printSection(name);

  for (const [key, value] of Object.entries(section)) {
    if (Array.isArray(value)) {
      printKeyValue(key, value.length > 0 ? value.join(', ') : '(none)');
    } else if (value !== undefined) {
      printKeyValue(key, String(value));
    }
  }

  console.log();
}
