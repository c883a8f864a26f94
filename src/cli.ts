import path from 'node:path';
import yargs from 'yargs';

import { resolveDefaultProfile, resolveDefaultRegion, resolveOutputRoot } from './audit/defaults.js';
import type { AwsSession, Ec2Api } from './audit/ec2Api.js';
import { runAudit } from './audit/runAudit.js';
import { DEFAULT_HOST, startServer } from './server.js';

export type CliDeps = {
  cwd: string;
  print: (text: string) => void;
  createApi?: (session: AwsSession) => Ec2Api;
};

const DEFAULT_PORT = 3001;

export function createCli(argv: string[], deps: CliDeps) {
  const outputRoot = resolveOutputRoot(deps.cwd);

  return yargs(argv)
    .scriptName('sg-audit')
    .usage('Audit the security groups of one AWS region and find (or delete) dangling ones.')
    .command(
      '$0 [region] [mode]',
      'Audit a region',
      (y) =>
        y
          .positional('region', {
            type: 'string',
            describe: 'Region to audit, e.g. us-west-2 (default: AWS_REGION)',
            default: resolveDefaultRegion(),
          })
          .positional('mode', {
            type: 'string',
            choices: ['dry-run', 'live-delete'],
            default: 'dry-run',
            describe: 'dry-run prints delete commands; live-delete runs them',
          })
          .option('output', {
            alias: 'o',
            type: 'string',
            describe: 'Base file name for an extra copy of the report (<base>.txt and <base>.json)',
          })
          .option('profile', {
            type: 'string',
            describe: 'Shared credentials profile (default: AWS_PROFILE)',
            default: resolveDefaultProfile(),
          })
          .option('keep-list', {
            type: 'string',
            describe: 'CSV with a groupId column of groups never proposed for deletion',
          })
          .option('include-default', {
            type: 'boolean',
            default: false,
            describe: "Propose groups named 'default' for deletion too",
          }),
      async (args) => {
        const result = await runAudit(
          {
            region: args.region,
            mode: args.mode,
            profile: args.profile,
            outputBase: args.output ? path.resolve(deps.cwd, args.output) : undefined,
            keepListPath: args['keep-list'] ? path.resolve(deps.cwd, args['keep-list']) : undefined,
            includeDefault: args['include-default'],
            outputRoot,
          },
          { createApi: deps.createApi },
        );
        deps.print(result.text.trimEnd());
        deps.print(`Report written to: ${result.outputDir}`);
        if (args.output) {
          deps.print(`Full text report saved to: ${args.output}.txt`);
          deps.print(`Structured JSON report saved to: ${args.output}.json`);
        }
      },
    )
    .command(
      'serve',
      'Run the audit HTTP API',
      (y) =>
        y
          .option('port', {
            type: 'number',
            default: Number(process.env.PORT ?? DEFAULT_PORT),
            describe: 'Port to listen on (default: PORT or 3001)',
          })
          .option('host', {
            type: 'string',
            default: DEFAULT_HOST,
            describe: 'Interface to bind; the API can delete security groups, so keep it local',
          }),
      async (args) => {
        await startServer({ outputRoot, port: args.port, host: args.host, audit: { createApi: deps.createApi } });
      },
    )
    .strict()
    .help();
}
