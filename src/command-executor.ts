/**
 * Command Executor
 *
 * Runs planned commands one at a time and honours the run mode: dry runs only
 * print, debug runs print every command and its output, quiet runs print
 * nothing but errors. A non-zero exit is an ExecutionError; nothing is retried.
 */

import { execa, type Options } from 'execa';
import { open } from 'fs/promises';
import { renderCommand, type PlannedCommand } from './mysql-commands.js';
import type { PortageLogger, RunMode } from './portage-logger.js';

export class ExecutionError extends Error {
  constructor(
    public command: string,
    public exitCode: number | undefined,
    public stderr: string,
    public cause?: Error
  ) {
    super(
      `Command exited with ${exitCode === undefined ? 'no exit code' : `code ${exitCode}`}: ${command}` +
        (stderr.trim() ? `\n${stderr.trim()}` : '')
    );
    this.name = 'ExecutionError';
  }
}

export interface ProcessOutput {
  exitCode: number | undefined;
  failed: boolean;
  stdout: string;
  stderr: string;
}

/**
 * Spawns the process behind a planned command. Swapped out in tests.
 */
export type CommandRunner = (command: PlannedCommand) => Promise<ProcessOutput>;

export interface CommandResult {
  exitCode: number;
  /** True when the command was only printed (dry run). */
  skipped: boolean;
  /** Captured streams, kept in debug mode only. */
  output?: { stdout: string; stderr: string };
}

/**
 * A file on stdin is handed to the child as an open descriptor rather than
 * piped through this process, so a client that exits before reading all of
 * it still reports its own exit code.
 */
export const execaRunner: CommandRunner = async command => {
  const inputFile = command.stdin?.kind === 'file' ? await open(command.stdin.path, 'r') : undefined;

  try {
    const options: Options = {
      env: command.env,
      reject: false,
      ...(inputFile ? { stdin: inputFile.fd } : {}),
      ...(command.stdin?.kind === 'sql' ? { input: command.stdin.sql } : {}),
    };

    const result = await execa(command.file, command.args, options);
    return {
      exitCode: result.exitCode,
      failed: result.failed,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  } finally {
    await inputFile?.close();
  }
};

export class CommandExecutor {
  private mode: RunMode;
  private logger: PortageLogger;
  private runner: CommandRunner;

  constructor(mode: RunMode, logger: PortageLogger, runner: CommandRunner = execaRunner) {
    this.mode = mode;
    this.logger = logger;
    this.runner = runner;
  }

  async run(command: PlannedCommand): Promise<CommandResult> {
    const rendered = renderCommand(command);
    this.logger.info(command.description);

    if (this.mode.dryRun) {
      this.logger.command(rendered);
      return { exitCode: 0, skipped: true };
    }

    if (this.mode.debug) {
      this.logger.command(rendered);
    }

    let output: ProcessOutput;
    try {
      output = await this.runner(command);
    } catch (error) {
      throw new ExecutionError(
        rendered,
        undefined,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }

    if (this.mode.debug) {
      if (output.stdout.trim()) {
        this.logger.debug(`stdout:\n${output.stdout.trimEnd()}`);
      }
      if (output.stderr.trim()) {
        this.logger.debug(`stderr:\n${output.stderr.trimEnd()}`);
      }
    }

    if (output.failed || output.exitCode !== 0) {
      throw new ExecutionError(rendered, output.exitCode, output.stderr);
    }

    return this.mode.debug
      ? { exitCode: 0, skipped: false, output: { stdout: output.stdout, stderr: output.stderr } }
      : { exitCode: 0, skipped: false };
  }
}
