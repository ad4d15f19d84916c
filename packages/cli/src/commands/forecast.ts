import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { formatMarkdown, type ForecastCoordinator, type ForecastResult } from '@forecastr/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { toErrorResponse } from '../errors.js';
import { createRuntime } from '../runtime.js';

interface ForecastOptions {
  quarters: number;
  source: string[];
  ticker?: string;
  local?: boolean;
}

export interface ForecastIO {
  json: boolean;
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleIO = (json: boolean): ForecastIO => ({
  json,
  out: text => console.log(text),
  err: text => console.error(text),
});

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Run one forecast and print it. Progress goes to `err`, the result or
 * the error body to `out` (JSON mode) or `err` (text mode).
 *
 * @returns the process exit code
 */
export async function executeForecast(
  coordinator: ForecastCoordinator,
  input: unknown,
  io: ForecastIO,
): Promise<number> {
  if (!io.json) {
    coordinator.on('state:change', e => io.err(chalk.dim(`  ${e.from} -> ${e.to}: ${e.trigger}`)));
    coordinator.on('document:gap', e => io.err(chalk.yellow(`  gap: ${e.gap.reason}`)));
    coordinator.on('model:retry', e =>
      io.err(chalk.yellow(`  ${e.step} attempt ${e.attempt} failed (${e.category ?? 'error'}), retrying in ${e.delayMs}ms`)));
  }

  let result: ForecastResult;
  try {
    result = await coordinator.run(input);
  } catch (error) {
    const { body } = toErrorResponse(error);
    if (io.json) {
      io.out(JSON.stringify(body, null, 2));
    } else {
      io.err(chalk.red(`${body.error.kind}: ${body.error.message}`));
      if ('state' in body.error && body.error.state !== undefined) {
        io.err(chalk.dim(`  failed in ${body.error.state}`));
      }
    }
    return 1;
  }

  if (io.json) {
    io.out(JSON.stringify(result, null, 2));
  } else {
    io.out(formatMarkdown(result));
    const status = result.status === 'complete'
      ? chalk.green(`Forecast complete for ${result.ticker}`)
      : chalk.yellow(`Forecast degraded for ${result.ticker}`);
    io.err(`${status} ${chalk.dim(`(run ${result.runId})`)}`);
  }
  return 0;
}

export function registerForecastCommand(program: Command): void {
  program
    .command('forecast')
    .description('Forecast a company from its recent reports and call transcripts')
    .requiredOption('-q, --quarters <n>', 'Number of recent quarters to read', parsePositiveInt)
    .option('-s, --source <id>', 'Document source from the manifest (repeatable)', collect, [])
    .option('-t, --ticker <symbol>', 'Company ticker (defaults to config)')
    .option('--local', 'Use the local model server')
    .action(async (options: ForecastOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const { coordinator } = await createRuntime(config, { local: options.local });

      process.exitCode = await executeForecast(
        coordinator,
        { quarters: options.quarters, sources: options.source, ticker: options.ticker },
        consoleIO(globalOpts.json === true),
      );
    });
}
