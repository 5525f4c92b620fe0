import { Command } from 'commander';
import chalk from 'chalk';
import { getDb } from '../db/index.js';
import { createTagging } from '../services/index.js';
import type { ExistingTag } from '../models/tag.js';

function displayTag(tag: ExistingTag): void {
  const countInfo = tag.count > 0
    ? chalk.blue(`${tag.count} uses`)
    : chalk.gray('unused');

  console.log(`  ${chalk.cyan(`#${tag.slug.padEnd(20)}`)} ${tag.name.padEnd(20)} ${countInfo}`);
}

export function createExistingCommand(): Command {
  return new Command('existing')
    .description('List tags used by a subject type')
    .argument('<type>', 'Subject type')
    .option('-n, --limit <limit>', 'Maximum number of tags', parseInt)
    .option('--json', 'Output as JSON')
    .action((type: string, options: { limit?: number; json?: boolean }) => {
      const { tagging } = createTagging(getDb());
      let tags = tagging.catalog.listExisting(type);

      if (options.limit) {
        tags = tags.slice(0, options.limit);
      }

      if (options.json) {
        console.log(JSON.stringify(tags));
        return;
      }

      if (tags.length === 0) {
        console.log(chalk.yellow(`No tags for "${type}" yet`));
        return;
      }

      console.log(chalk.bold.green(`\nTags on ${type}\n`));
      for (const tag of tags) {
        displayTag(tag);
      }
      console.log(chalk.gray(`\n${tags.length} tags`));
    });
}

export function createFindCommand(): Command {
  return new Command('find')
    .description('Find subjects by tag (all tags by default)')
    .argument('<type>', 'Subject type')
    .argument('<tags...>', 'Tag names')
    .option('--any', 'Match subjects carrying any of the tags')
    .option('--json', 'Output as JSON')
    .action((type: string, tags: string[], options: { any?: boolean; json?: boolean }) => {
      const { query } = createTagging(getDb());
      const filter = options.any ? query.withAnyTag(type, tags) : query.withAllTags(type, tags);

      if (options.json) {
        console.log(JSON.stringify(filter));
        return;
      }

      if (filter.kind === 'unfiltered') {
        console.log(chalk.gray(`No usable tag names: every ${type} matches`));
        return;
      }

      if (filter.ids.length === 0) {
        console.log(chalk.yellow(`No ${type} matches`));
        return;
      }

      for (const id of filter.ids) {
        console.log(`  ${chalk.cyan(`${type}#${id}`)}`);
      }
      console.log(chalk.gray(`\n${filter.ids.length} matches`));
    });
}
