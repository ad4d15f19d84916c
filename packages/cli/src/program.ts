import { Command } from 'commander';
import chalk from 'chalk';
import { setLogLevel } from '@forecastr/core';
import { loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { registerForecastCommand } from './commands/forecast.js';
import { registerServeCommand } from './commands/serve.js';
import { registerConfigCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('forecastr')
    .description('Confidence-scored company forecasts from quarterly reports and call transcripts')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Machine-readable JSON output')
    .option('-c, --config <path>', 'Path to config file');

  registerForecastCommand(program);
  registerServeCommand(program, VERSION);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);
    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    if (opts.verbose && !process.env['LOG_LEVEL']) setLogLevel('debug');

    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: opts.config });

    if (!configFileExists && envKeysUsed.length > 0 && !opts.json) {
      console.error(chalk.cyan(`  Using ${envKeysUsed.join(', ')} from environment.`));
    }

    const needsModel = chain[0] === 'forecast' || chain[0] === 'serve';
    const local = config.model.backend === 'local' || actionCommand.opts<{ local?: boolean }>().local === true;
    const hasAnyKey = Object.values(config.model.providers).some(p => p.api_key);

    if (needsModel && !local && !hasAnyKey) {
      console.error(chalk.red('No API key found.\n'));
      console.error(chalk.white('Export one of:'));
      console.error(chalk.green('  export ANTHROPIC_API_KEY=...'));
      console.error(chalk.green('  export OPENAI_API_KEY=...'));
      console.error(chalk.green('  export GEMINI_API_KEY=...\n'));
      console.error(chalk.white('or run against a local model server with --local.'));
      process.exit(1);
    }

    setConfig(config);
  });

  return program;
}

function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
