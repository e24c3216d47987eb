#!/usr/bin/env node

import { realpathSync } from 'fs';
import { parseArgs } from 'node:util';
import { fileURLToPath } from 'url';
import { CommandExecutor, execaRunner, type CommandRunner } from './command-executor.js';
import { ConfigError, describeConfig, loadConfig } from './portage-config.js';
import { PortageLogger, type LogSink, type RunMode } from './portage-logger.js';
import { PortageRunner } from './portage-runner.js';
import { ToolNotFoundError, resolveTools } from './tool-locator.js';

export const EXIT_SUCCESS = 0;
export const EXIT_PORTAGE_FAILED = 1;
export const EXIT_USAGE = 2;

const cliOptions = {
  help: { type: 'boolean', short: 'h' },
  quiet: { type: 'boolean', short: 'q' },
  debug: { type: 'boolean', short: 'X' },
  'dry-run': { type: 'boolean', short: 'd' },
} as const;

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  sink?: LogSink;
  runner?: CommandRunner;
}

export function usage(): string {
  return `
Usage: mysql-portage [-h] [-q] [-X] [-d] config_file

Port the schema and selected data of a source MySQL database into one or more
destination databases, as described by a YAML configuration file.

Arguments:
  config_file        yaml-formatted configuration file

Options:
  -h, --help         Show this help message
  -q, --quiet        Run with no output except errors
  -X, --debug        Show parsed config, all commands, and keep temp files
  -d, --dry-run      Show commands without running them

Environment:
  MYSQLDUMP_PATH     mysqldump executable (default: found on PATH)
  MYSQL_PATH         mysql executable (default: found on PATH)
  PORTAGE_TMPDIR     Directory for temporary dump files (default: OS temp dir)

Exit codes:
  0  every portage completed
  1  one or more portages failed
  2  invalid arguments, configuration, or missing tools
`;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: cliOptions, allowPositionals: true });
}

/**
 * Run the tool and return its exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const sink = deps.sink ?? console;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    sink.error(`❌ ${error instanceof Error ? error.message : error}`);
    sink.error(usage());
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    sink.log(usage());
    return EXIT_SUCCESS;
  }

  if (positionals.length !== 1) {
    sink.error(
      positionals.length === 0
        ? '❌ A configuration file is required'
        : `❌ Expected one configuration file, got ${positionals.length}`
    );
    sink.error(usage());
    return EXIT_USAGE;
  }
  const [configPath] = positionals;

  const mode: RunMode = {
    quiet: values.quiet ?? false,
    debug: values.debug ?? false,
    dryRun: values['dry-run'] ?? false,
  };
  const logger = new PortageLogger(mode, sink);

  try {
    const config = await loadConfig(configPath);
    logger.debug(`Parsed configuration:\n${describeConfig(config)}`);

    const tools = resolveTools(env, mode.dryRun);
    const executor = new CommandExecutor(mode, logger, deps.runner ?? execaRunner);
    const runner = new PortageRunner({ mode, tools, tempRoot: env.PORTAGE_TMPDIR }, executor, logger);

    const summary = await runner.runAll(config);
    return summary.success ? EXIT_SUCCESS : EXIT_PORTAGE_FAILED;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof ToolNotFoundError) {
      logger.error(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }
}

// Execute if called directly
if (process.argv[1] && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('\n❌ Error:', error instanceof Error ? error.message : error);
      process.exitCode = EXIT_PORTAGE_FAILED;
    });
}
