#!/usr/bin/env node
import { parseArgs } from 'util';
import { loadConfig } from './config/loader.js';
import { checkPrerequisites } from './preflight/prerequisites.js';
import { Prompter, collectInputs, seedInputs, type PromptStreams } from './input/prompts.js';
import { validateInputs } from './input/validate.js';
import { runDeployment } from './deploy/pipeline.js';
import { ExecaRunner, type CommandRunner } from './shared/exec.js';
import { DeployError, DeployErrorCode, EXIT_SUCCESS, describeError, exitCodeFor } from './shared/errors.js';
import { attachLogFile, logFilePath, logger } from './shared/logger.js';

export const USAGE = `Usage: hostdeploy [--cleanup] [--config <path>]

Deploys a Dockerised git repository to a remote host over SSH and puts nginx in front of it.

Options:
  --cleanup          Remove the deployed app, its containers and the nginx site instead of deploying
  -c, --config PATH  Config file (default: ~/.config/hostdeploy/config.yaml)
  -h, --help         Show this help

Exit codes:
   0 success
  10 missing program / prerequisite
  20 validation error
  30 ssh/connection error
  40 remote exec error
  50 deploy/runtime error
`;

export interface CliOptions {
  cleanup: boolean;
  configPath?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        cleanup: { type: 'boolean', default: false },
        config: { type: 'string', short: 'c' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
    return { cleanup: values.cleanup === true, configPath: values.config, help: values.help === true };
  } catch (err) {
    throw new DeployError(DeployErrorCode.VALIDATION_FAILED, describeError(err));
  }
}

export interface MainDeps {
  runner?: CommandRunner;
  streams?: PromptStreams;
  env?: NodeJS.ProcessEnv;
}

export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  const runner = deps.runner ?? new ExecaRunner();
  const env = deps.env ?? process.env;
  const streams = deps.streams ?? { input: process.stdin, output: process.stdout };
  let prompter: Prompter | undefined;

  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      streams.output.write(USAGE);
      return EXIT_SUCCESS;
    }

    const { config, configPath, fromFile } = loadConfig(options.configPath);
    const logFile = logFilePath(config.workspace.log_dir);
    attachLogFile(logFile);
    logger.info({ logFile, config: fromFile ? configPath : 'defaults' }, `Starting deployment. Logging to ${logFile}`);

    const prerequisites = await checkPrerequisites(runner);

    prompter = new Prompter(streams);
    const raw = await collectInputs(prompter, seedInputs(env, config.defaults));
    prompter.close();
    prompter = undefined;
    const inputs = validateInputs(raw);

    const result = await runDeployment(inputs, { cleanup: options.cleanup }, {
      runner,
      config,
      rsyncAvailable: prerequisites.available.has('rsync'),
    });

    if (result.action === 'cleanup') {
      logger.info({ durationMs: result.durationMs }, 'Cleanup complete');
    } else {
      logger.info(
        { buildMode: result.buildMode, transfer: result.transferMethod, httpStatus: result.httpStatus, durationMs: result.durationMs },
        `Deployment complete. Logfile: ${logFile}`
      );
    }
    return EXIT_SUCCESS;
  } catch (err) {
    const code = err instanceof DeployError ? err.code : 'UNEXPECTED';
    const context = err instanceof DeployError ? err.context : undefined;
    logger.error({ code, context }, `ERROR: ${describeError(err)}`);
    return exitCodeFor(err);
  } finally {
    prompter?.close();
    logger.info('Script exiting');
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      process.stderr.write(`${describeError(err)}\n`);
      process.exitCode = exitCodeFor(err);
    });
}
