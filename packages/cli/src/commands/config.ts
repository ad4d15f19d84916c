import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { getConfig, type GlobalOptions } from '../context.js';
import { getConfigPath, type Config } from '../config/index.js';

/** Copy of the config with API keys masked. */
export function redactConfig(config: Config): Config {
  const copy = structuredClone(config);
  for (const provider of Object.values(copy.model.providers)) {
    if (provider.api_key) provider.api_key = `${provider.api_key.slice(0, 4)}…`;
  }
  return copy;
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Inspect forecastr configuration');

  config
    .command('show')
    .description('Show the effective configuration')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const cfg = redactConfig(getConfig());

      if (globalOpts.json) {
        console.log(JSON.stringify(cfg, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:'));
        console.log(chalk.dim(`${getConfigPath(globalOpts.config)}\n`));
        console.log(stringify(cfg));
      }
    });
}
