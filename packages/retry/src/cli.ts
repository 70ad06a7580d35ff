/**
 * `rebound` command line: inspect retry policy files
 */

import { ConfigUtils } from '@rebound/configuration';
import { Command, InvalidArgumentError } from 'commander';

import { getRetryPolicy, loadRetryPolicies, previewWaits } from './policy.js';

export interface CliOutput {
  write(line: string): void;
}

interface PoliciesCommandOptions {
  config: string;
  json?: boolean;
}

interface PreviewCommandOptions extends PoliciesCommandOptions {
  policy: string;
  count: number;
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return count;
}

const describeLimit = (value: number | null, format: (n: number) => string): string =>
  value === null ? 'unlimited' : format(value);

/**
 * Build the command tree. Output goes through `output` so callers decide where lines land.
 */
export function createCli(output: CliOutput = { write: line => console.log(line) }): Command {
  const program = new Command();

  program
    .name('rebound')
    .description('Inspect retry policies declared in YAML files')
    .version('0.1.0');

  program
    .command('policies')
    .description('List the policies of a policy file')
    .requiredOption('-c, --config <path>', 'Policy file path')
    .option('--json', 'Output in JSON format')
    .action(async (options: PoliciesCommandOptions) => {
      const policies = await loadRetryPolicies(options.config);

      if (options.json) {
        output.write(
          JSON.stringify(
            [...policies].map(([name, policy]) => ({
              name,
              schedule: policy.wait.kind,
              maxTries: policy.maxTries,
              maxTimeMs: policy.maxTimeMs,
            }))
          )
        );
        return;
      }

      for (const [name, policy] of policies) {
        const tries = describeLimit(policy.maxTries, String);
        const time = describeLimit(policy.maxTimeMs, ConfigUtils.formatDuration);
        output.write(`${name}\t${policy.wait.kind}\tmax tries: ${tries}\tmax time: ${time}`);
      }
    });

  program
    .command('preview')
    .description('Print the first waits a policy would use')
    .requiredOption('-c, --config <path>', 'Policy file path')
    .requiredOption('-p, --policy <name>', 'Policy name')
    .option('-n, --count <count>', 'Number of waits', parseCount, 5)
    .option('--json', 'Output in JSON format')
    .action(async (options: PreviewCommandOptions) => {
      const policy = getRetryPolicy(await loadRetryPolicies(options.config), options.policy);
      const waits = previewWaits(policy, options.count);

      if (options.json) {
        output.write(JSON.stringify({ policy: options.policy, waitsMs: waits }));
        return;
      }

      waits.forEach((waitMs, index) => {
        output.write(`${index + 1}\t${ConfigUtils.formatDuration(waitMs)}`);
      });
    });

  return program;
}
