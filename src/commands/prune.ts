import { Command } from 'commander';
import chalk from 'chalk';
import readline from 'readline';
import { getDb } from '../db/index.js';
import { createTagging } from '../services/index.js';

export function createPruneCommand(): Command {
  return new Command('prune')
    .description('Delete tags that are no longer linked to anything')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (options: { yes?: boolean }) => {
      const { tagging } = createTagging(getDb());
      const unused = tagging.catalog.all().filter(tag => tag.count <= 0);

      if (unused.length === 0) {
        console.log(chalk.gray('No unused tags'));
        return;
      }

      if (!options.yes) {
        console.log(chalk.yellow('The following tags will be deleted:'));
        for (const tag of unused) {
          console.log(`  #${tag.slug}`);
        }

        const rl = readline.createInterface({
          input: process.stdin,
          output: process.stdout,
        });

        const answer = await new Promise<string>(resolve => {
          rl.question('Continue? (y/N) ', resolve);
        });
        rl.close();

        if (answer.toLowerCase() !== 'y') {
          console.log('Cancelled');
          return;
        }
      }

      const deleted = tagging.catalog.deleteUnused();
      console.log(chalk.green(`✓ Deleted ${deleted} unused tags`));
    });
}
