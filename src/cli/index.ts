import { Command, Option } from 'commander';
import type { LogLevel } from '../types/index.js';
import { run, VERSION, type CliOptions } from './run.js';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const program = new Command();

program
    .name('arxiv-digest')
    .description('Fetch new arXiv papers, summarize them in Chinese and publish a static daily digest.')
    .version(VERSION)
    .option('-d, --date <date>', 'Run date (YYYY-MM-DD), defaults to today (UTC)')
    .option('--dry-run', 'Fetch and summarize without writing anything')
    .option('-c, --config <path>', 'Config file (default: search for arxivdigest.config.* or config.yaml)')
    .addOption(new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS))
    .option('--json-logs', 'Output JSON logs')
    .action(async () => {
        process.exitCode = await run(program.opts<CliOptions>());
    });

await program.parseAsync();
