import { Command } from 'commander';
import chalk from 'chalk';
import { getDb } from '../db/index.js';
import { getConfig, setConfig, deleteConfig, getAllConfig, loadTaggingOptions } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { CONFIG_KEYS } from '../models/config.js';

export function createConfigCommand(): Command {
  const config = new Command('config').description('Manage configuration');

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Configuration key')
    .argument('<value>', 'Configuration value')
    .option('--json', 'Output as JSON')
    .action((key: string, value: string, options: { json?: boolean }) => {
      const db = getDb();
      // 未知键或非法值会抛出 ConfigurationError 并回滚写入
      db.transaction(() => {
        setConfig(db, key, value);
        loadTaggingOptions(db);
      })();

      if (options.json) {
        console.log(JSON.stringify({ success: true, key, value }));
      } else {
        logger.success(`Configuration set: ${key} = ${value}`);
      }
    });

  config
    .command('get')
    .description('Get a configuration value')
    .argument('<key>', 'Configuration key')
    .option('--json', 'Output as JSON')
    .action((key: string, options: { json?: boolean }) => {
      const value = getConfig(getDb(), key);

      if (options.json) {
        console.log(JSON.stringify({ key, value }));
      } else if (value !== null) {
        console.log(`${key} = ${value}`);
      } else {
        logger.warn(`Configuration not found: ${key}`);
      }
    });

  config
    .command('delete')
    .description('Delete a configuration value')
    .argument('<key>', 'Configuration key')
    .option('--json', 'Output as JSON')
    .action((key: string, options: { json?: boolean }) => {
      const success = deleteConfig(getDb(), key);

      if (options.json) {
        console.log(JSON.stringify({ success }));
      } else if (success) {
        logger.success(`Configuration deleted: ${key}`);
      } else {
        logger.warn(`Configuration not found: ${key}`);
      }
    });

  config
    .command('list')
    .description('List all configurations')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const configs = getAllConfig(getDb());

      if (options.json) {
        console.log(JSON.stringify(configs));
        return;
      }

      if (configs.length === 0) {
        logger.info('No configurations found');
        console.log();
        console.log(chalk.dim('Available configuration keys:'));
        for (const [name, key] of Object.entries(CONFIG_KEYS)) {
          console.log(chalk.dim(`  ${name}: ${key}`));
        }
        return;
      }

      console.log();
      console.log(chalk.bold('Configurations:'));
      console.log();

      for (const cfg of configs) {
        console.log(`  ${chalk.cyan(cfg.key)} = ${cfg.value}`);
      }
      console.log();
    });

  return config;
}
