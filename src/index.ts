#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { env } from './config/env';
import { logger } from './observability/logger';
import { runAnalyze } from './cli/analyze-command';
import { runRecommend } from './cli/recommend-command';

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('intent-recommender')
    .option('data-dir', {
      alias: 'd',
      type: 'string',
      default: env.pipeline.dataDir,
      describe: 'Directory holding products.csv, messages.csv and recommendations_history.csv',
    })
    .command(
      'recommend',
      'Generate recommendations for every message, or for one --message',
      (cli) => cli
        .option('output', {
          alias: 'o',
          type: 'string',
          default: env.pipeline.outputPath,
          describe: 'CSV file to write',
        })
        .option('message', {
          alias: 'm',
          type: 'string',
          describe: 'Recommend for this text only',
        }),
      async (argv) => {
        process.exitCode = await runRecommend({
          output: argv.output,
          dataDir: argv.dataDir,
          message: argv.message,
        });
      },
    )
    .command(
      'analyze',
      'Score a recommendation file against recorded clicks and purchases',
      (cli) => cli
        .option('recommendations', {
          alias: 'r',
          type: 'string',
          describe: 'Recommendation CSV to evaluate (default: the historical recommendations)',
        })
        .option('compare', {
          type: 'boolean',
          default: false,
          describe: 'Compare with the historical recommendations',
        })
        .option('json', {
          type: 'boolean',
          default: false,
          describe: 'Print metrics as JSON',
        }),
      async (argv) => {
        process.exitCode = await runAnalyze({
          recommendations: argv.recommendations,
          dataDir: argv.dataDir,
          compare: argv.compare,
          json: argv.json,
        });
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Command failed');
  process.exitCode = 1;
});
