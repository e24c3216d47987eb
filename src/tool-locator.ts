/**
 * Finds the mysqldump and mysql executables before any portage starts.
 */

import { accessSync, constants, statSync } from 'fs';
import { delimiter, join, sep } from 'path';
import type { MySqlTools } from './mysql-commands.js';

export class ToolNotFoundError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ToolNotFoundError';
  }
}

const TOOL_OVERRIDES: Record<keyof MySqlTools, string> = {
  mysqldump: 'MYSQLDUMP_PATH',
  mysql: 'MYSQL_PATH',
};

/**
 * Resolve a program the way `which` does. A name containing a path separator
 * is checked as-is instead of being searched on PATH.
 */
export function locateExecutable(
  program: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (program.includes(sep)) {
    return isExecutable(program) ? program : undefined;
  }

  for (const entry of (env.PATH ?? '').split(delimiter)) {
    const dir = entry.replace(/^"(.*)"$/, '$1');
    if (dir.length === 0) {
      continue;
    }
    const candidate = join(dir, program);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Locate both client tools. In dry-run mode nothing is spawned, so the
 * configured names are returned without looking them up.
 */
export function resolveTools(env: NodeJS.ProcessEnv = process.env, dryRun = false): MySqlTools {
  const resolveOne = (tool: keyof MySqlTools): string => {
    const override = TOOL_OVERRIDES[tool];
    const requested = env[override] || tool;
    if (dryRun) {
      return requested;
    }
    const found = locateExecutable(requested, env);
    if (!found) {
      throw new ToolNotFoundError(
        `Must have ${requested} executable in PATH (or set ${override} to its location)`
      );
    }
    return found;
  };

  return { mysqldump: resolveOne('mysqldump'), mysql: resolveOne('mysql') };
}

function isExecutable(file: string): boolean {
  try {
    if (!statSync(file).isFile()) {
      return false;
    }
    accessSync(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
