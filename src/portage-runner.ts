/**
 * Portage Runner
 *
 * Carries out each configured portage in strict sequence, once its update
 * scripts are known to be readable:
 *
 *   dump -> create-database -> grant-users -> load (per destination) -> update -> cleanup
 *
 * A failing command aborts the rest of its portage. Destinations already
 * loaded are left as they are. The batch carries on with the next portage and
 * the summary reports the overall outcome.
 */

import { constants } from 'fs';
import { access, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CommandExecutor } from './command-executor.js';
import { MySqlCommandBuilder, renderCommand, type MySqlTools, type PlannedCommand } from './mysql-commands.js';
import type { Portage, PortageConfig } from './portage-config.js';
import type { PortageLogger, RunMode } from './portage-logger.js';

const DUMP_FILE_NAME = 'dump.sql';

export class FileError extends Error {
  constructor(
    message: string,
    public path: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'FileError';
  }
}

export type PortagePhase =
  | 'prepare'
  | 'dump'
  | 'create-database'
  | 'grant-users'
  | 'load'
  | 'update'
  | 'cleanup';

export interface PortageResult {
  name: string;
  success: boolean;
  failedPhase?: PortagePhase;
  error?: string;
  /** Rendered form of every command issued (or printed, in a dry run). */
  commands: string[];
  dumpFile?: string;
  /** True when the temporary directory was kept for inspection. */
  retained: boolean;
  logs: string[];
}

export interface RunSummary {
  success: boolean;
  results: PortageResult[];
}

export interface PortageRunnerOptions {
  mode: RunMode;
  tools: MySqlTools;
  /** Parent of the per-portage temporary directories. Defaults to the OS temp dir. */
  tempRoot?: string;
}

export class PortageRunner {
  private mode: RunMode;
  private tools: MySqlTools;
  private tempRoot: string;
  private executor: CommandExecutor;
  private logger: PortageLogger;

  constructor(options: PortageRunnerOptions, executor: CommandExecutor, logger: PortageLogger) {
    this.mode = options.mode;
    this.tools = options.tools;
    this.tempRoot = options.tempRoot || tmpdir();
    this.executor = executor;
    this.logger = logger;
  }

  /**
   * Run every portage in configuration order. A failed portage does not stop the batch.
   */
  async runAll(config: PortageConfig): Promise<RunSummary> {
    const results: PortageResult[] = [];
    for (const portage of config.portages) {
      results.push(await this.runPortage(portage));
    }

    this.logSummary(results);
    return { success: results.every(result => result.success), results };
  }

  async runPortage(portage: Portage): Promise<PortageResult> {
    const mark = this.logger.mark();
    const builder = new MySqlCommandBuilder(portage, this.tools);
    const commands: string[] = [];

    let phase: PortagePhase = 'prepare';
    let workDir: string | undefined;
    let dumpFile: string | undefined;
    let failure: { phase: PortagePhase; error: unknown } | undefined;

    this.logger.info('='.repeat(60));
    this.logger.info(
      `🚀 Starting portage ${portage.name}${this.mode.dryRun ? ' (DRY RUN)' : ''}`
    );
    this.logger.info('='.repeat(60));

    if (!portage.createDestDb && portage.testUsers.length > 0) {
      this.logger.info(
        `⚠️  Ignoring ${portage.testUsers.length} test user(s): grants need create_dest_db`
      );
    }

    try {
      if (portage.update.length > 0) {
        phase = 'update';
        await this.checkUpdateScripts(portage.update);
        phase = 'prepare';
      }

      if (this.mode.dryRun) {
        dumpFile = join(this.tempRoot, 'portage-dry-run', DUMP_FILE_NAME);
      } else {
        workDir = await this.createWorkDir();
        dumpFile = join(workDir, DUMP_FILE_NAME);
      }

      phase = 'dump';
      await this.execute(builder.dumpCommand(dumpFile), commands);

      phase = 'create-database';
      for (const command of builder.createDatabaseCommands()) {
        await this.execute(command, commands);
      }

      phase = 'grant-users';
      for (const command of builder.grantCommands()) {
        await this.execute(command, commands);
      }

      phase = 'load';
      for (const command of builder.loadCommands(dumpFile)) {
        await this.execute(command, commands);
      }

      phase = 'update';
      for (const command of builder.updateCommands()) {
        await this.execute(command, commands);
      }
    } catch (error) {
      failure = { phase, error };
      this.logger.error(`Portage ${portage.name} failed during ${phase}`, error);
    }

    const cleanupError = await this.cleanup(workDir);
    if (cleanupError && !failure) {
      failure = { phase: 'cleanup', error: cleanupError };
    }

    if (!failure) {
      this.logger.info(`✅ Portage ${portage.name} complete`);
    }

    return {
      name: portage.name,
      success: !failure,
      failedPhase: failure?.phase,
      error: failure ? describeError(failure.error) : undefined,
      commands,
      dumpFile,
      retained: workDir !== undefined && this.mode.debug,
      logs: this.logger.linesSince(mark),
    };
  }

  private async execute(command: PlannedCommand, issued: string[]): Promise<void> {
    issued.push(renderCommand(command));
    await this.executor.run(command);
  }

  private async createWorkDir(): Promise<string> {
    const prefix = join(this.tempRoot, 'portage-');
    try {
      return await mkdtemp(prefix);
    } catch (error) {
      throw new FileError(
        `Cannot create temporary directory under ${this.tempRoot}`,
        this.tempRoot,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Every update script must be readable before anything runs.
   */
  private async checkUpdateScripts(scripts: string[]): Promise<void> {
    for (const script of scripts) {
      try {
        await access(script, constants.R_OK);
      } catch (error) {
        throw new FileError(
          `Update script is not readable: ${script}`,
          script,
          error instanceof Error ? error : undefined
        );
      }
    }
  }

  private async cleanup(workDir: string | undefined): Promise<Error | undefined> {
    if (!workDir) {
      return undefined;
    }

    if (this.mode.debug) {
      this.logger.info(`💾 Keeping temporary files in ${workDir}`);
      return undefined;
    }

    this.logger.info('🧹 Removing temporary files...');
    try {
      await rm(workDir, { recursive: true, force: true });
      return undefined;
    } catch (error) {
      const cleanupError = new FileError(
        `Could not remove temporary directory ${workDir}`,
        workDir,
        error instanceof Error ? error : undefined
      );
      this.logger.error(cleanupError.message, error);
      return cleanupError;
    }
  }

  private logSummary(results: PortageResult[]): void {
    const failed = results.filter(result => !result.success);

    this.logger.info('📊 Portage Summary:');
    this.logger.info(`   ✅ Succeeded: ${results.length - failed.length}`);
    this.logger.info(`   ❌ Failed: ${failed.length}`);
    for (const result of failed) {
      this.logger.error(`${result.name} failed during ${result.failedPhase}: ${result.error}`);
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
