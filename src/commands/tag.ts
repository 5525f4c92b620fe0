import { Command } from 'commander';
import chalk from 'chalk';
import { getDb } from '../db/index.js';
import { createTagging } from '../services/index.js';
import type { Taggable } from '../models/tag.js';
import type { TagEvent } from '../models/events.js';
import { logger } from '../utils/logger.js';

function subjectOf(type: string, id: string): Taggable {
  return { taggableType: type, taggableId: id };
}

function reportEvent(event: TagEvent): void {
  if (event.type === 'tag-added') {
    logger.success(`Added ${chalk.cyan(`#${event.slug}`)} (${event.name})`);
  } else {
    logger.success(`Removed ${event.slugs.map(s => chalk.cyan(`#${s}`)).join(' ')}`);
  }
}

function printTags(subject: Taggable, names: string[]): void {
  const label = `${subject.taggableType}#${subject.taggableId}`;
  if (names.length === 0) {
    console.log(chalk.gray(`${label} has no tags`));
    return;
  }
  console.log(`${chalk.bold(label)} ${names.map(n => chalk.cyan(n)).join(', ')}`);
}

export function createTagCommand(): Command {
  return new Command('tag')
    .description('Attach tags to a subject')
    .argument('<type>', 'Subject type')
    .argument('<id>', 'Subject id')
    .argument('<tags...>', 'Tag names (comma separated values are split)')
    .action((type: string, id: string, tags: string[]) => {
      const { tagging, events } = createTagging(getDb());
      events.subscribe(reportEvent);
      const subject = subjectOf(type, id);
      tagging.attach(subject, tags);
      printTags(subject, tagging.tagNames(subject));
    });
}

export function createUntagCommand(): Command {
  return new Command('untag')
    .description('Detach tags from a subject (all tags when none are given)')
    .argument('<type>', 'Subject type')
    .argument('<id>', 'Subject id')
    .argument('[tags...]', 'Tag names')
    .action((type: string, id: string, tags: string[]) => {
      const { tagging, events } = createTagging(getDb());
      events.subscribe(reportEvent);
      const subject = subjectOf(type, id);
      tagging.detach(subject, tags.length > 0 ? tags : null);
      printTags(subject, tagging.tagNames(subject));
    });
}

export function createRetagCommand(): Command {
  return new Command('retag')
    .description('Replace the tags of a subject')
    .argument('<type>', 'Subject type')
    .argument('<id>', 'Subject id')
    .argument('[tags...]', 'Tag names')
    .action((type: string, id: string, tags: string[]) => {
      const { tagging, events } = createTagging(getDb());
      events.subscribe(reportEvent);
      const subject = subjectOf(type, id);
      tagging.replace(subject, tags);
      printTags(subject, tagging.tagNames(subject));
    });
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show the tags of a subject')
    .argument('<type>', 'Subject type')
    .argument('<id>', 'Subject id')
    .option('--json', 'Output as JSON')
    .action((type: string, id: string, options: { json?: boolean }) => {
      const { tagging } = createTagging(getDb());
      const subject = subjectOf(type, id);

      if (options.json) {
        console.log(JSON.stringify(tagging.tags(subject)));
        return;
      }

      printTags(subject, tagging.tagNames(subject));
    });
}
