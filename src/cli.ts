#!/usr/bin/env node
/**
 * Command-line interface for the roadmap builder.
 *
 * Runs the roadmap graph for one topic, saves the document and prints it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { getConfig } from '#roadmap/config.js';
import { ConfigurationError } from '#roadmap/ai/error.js';
import { UserLevelSchema } from '#roadmap/ai/roadmap/schemas.js';
import { runRoadmapWorkflow } from '#roadmap/ai/roadmap/roadmap-workflow.js';
import { saveRoadmap } from '#roadmap/ai/roadmap/file-storage.js';
import { setLogLevel } from '#roadmap/util/logging.js';

const CliOptionsSchema = z.object({
  level: UserLevelSchema,
  quiet: z.boolean().optional(),
  output: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  timeBudget: z.coerce.number().positive().optional(),
});

const program = new Command();

program
  .name('roadmap')
  .description('Build a staged reading roadmap for a topic')
  .version('0.1.0')
  .argument('<topic>', 'subject to build the roadmap for')
  .option('-l, --level <level>', 'beginner, intermediate or advanced', 'beginner')
  .option('-q, --quiet', 'only print the final roadmap')
  .option('-o, --output <path>', 'also write the roadmap to this path')
  .option('--output-dir <dir>', 'directory for the timestamped roadmap files')
  .option('--time-budget <seconds>', 'stop starting new steps after this many seconds')
  .action(async (topic: string, rawOptions: unknown) => {
    const parsed = CliOptionsSchema.safeParse(rawOptions);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      console.error(chalk.red(`Invalid options: ${issues.join('; ')}`));
      process.exitCode = 1;
      return;
    }
    const options = parsed.data;
    if (!topic.trim()) {
      console.error(chalk.red('Topic must not be empty'));
      process.exitCode = 1;
      return;
    }

    if (options.quiet) {
      setLogLevel('silent');
    } else {
      console.log(chalk.blue(`Building a ${options.level} roadmap for "${topic}"...`));
    }

    const result = await runRoadmapWorkflow(topic, options.level, {
      timeBudgetMs: options.timeBudget !== undefined ? options.timeBudget * 1000 : undefined,
    });
    const document = result.state.finalOutput;
    if (document === null) {
      throw new Error(`Run ended at ${result.terminal} without a roadmap`);
    }

    const paths = await saveRoadmap(topic, document, {
      outputDir: options.outputDir ?? getConfig('output-dir'),
      limited: result.limited,
      extraPath: options.output,
    });

    console.log(document);
    if (result.limited) {
      console.log(chalk.yellow('Roadmap is limited: the run stopped before it passed validation.'));
    }
    for (const written of paths) {
      console.log(chalk.green(`Saved ${written}`));
    }
  });

program.parseAsync().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(`Configuration error: ${error.message}`));
  } else {
    console.error(chalk.red(`Roadmap failed: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exitCode = 1;
});
