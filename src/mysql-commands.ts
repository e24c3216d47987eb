/**
 * MySQL Command Builder
 *
 * Turns a portage into the mysqldump / mysql invocations needed to carry it
 * out. Nothing here runs a process.
 *
 * Passwords never appear in an argument list: the connecting account's
 * password travels in MYSQL_PWD, and SQL that embeds a test user's password
 * is fed to the client on stdin.
 */

import type { Connection, Permission, Portage, UserGrant } from './portage-config.js';

export interface MySqlTools {
  mysqldump: string;
  mysql: string;
}

export type CommandInput =
  | { kind: 'file'; path: string }
  | { kind: 'sql'; sql: string; display: string };

export interface PlannedCommand {
  description: string;
  file: string;
  args: string[];
  /** Added to the inherited environment of the child process. */
  env: Record<string, string>;
  stdin?: CommandInput;
}

export const PERMISSION_GRANTS: Record<Permission, string> = {
  read: 'SELECT',
  write: 'SELECT, INSERT, UPDATE, DELETE',
  admin: 'ALL PRIVILEGES',
};

export class MySqlCommandBuilder {
  private portage: Portage;
  private tools: MySqlTools;

  constructor(portage: Portage, tools: MySqlTools) {
    this.portage = portage;
    this.tools = tools;
  }

  /**
   * Dump schema, and data unless fetch_data is off, into `outputFile`.
   */
  dumpCommand(outputFile: string): PlannedCommand {
    const { source, fetchData, ignoreTables } = this.portage;

    let dataFlag: string;
    let dumpType: string;
    if (!fetchData) {
      dataFlag = '--no-data';
      dumpType = 'empty schema';
    } else if (ignoreTables.length > 0) {
      dataFlag = '--complete-insert';
      dumpType = `schema and data, ignoring ${ignoreTables.length} table(s)`;
    } else {
      dataFlag = '--complete-insert';
      dumpType = 'all tables and data';
    }

    return {
      description: `Dumping ${dumpType} from ${source.host}.${source.name}...`,
      file: this.tools.mysqldump,
      args: [
        '--lock-tables=false',
        '--routines=true',
        dataFlag,
        ...ignoreTables.map(table => `--ignore-table=${source.name}.${table}`),
        `--result-file=${outputFile}`,
        ...connectionArgs(source),
        source.name,
      ],
      env: credentials(source),
    };
  }

  /**
   * Drop and recreate each destination database. Empty unless create_dest_db is set.
   */
  createDatabaseCommands(): PlannedCommand[] {
    if (!this.portage.createDestDb) {
      return [];
    }

    return this.portage.dest.map((dest): PlannedCommand => {
      const sql = `DROP DATABASE IF EXISTS ${quoteIdentifier(dest.name)}; CREATE DATABASE ${quoteIdentifier(dest.name)};`;
      return {
        description: `Creating ${dest.name} on ${dest.host}...`,
        file: this.tools.mysql,
        args: connectionArgs(dest),
        env: credentials(dest),
        stdin: { kind: 'sql', sql, display: sql },
      };
    });
  }

  /**
   * One grant per test user and destination. Test users are only provisioned
   * on databases this tool creates.
   */
  grantCommands(): PlannedCommand[] {
    if (!this.portage.createDestDb) {
      return [];
    }

    const commands: PlannedCommand[] = [];
    for (const grant of this.portage.testUsers) {
      for (const dest of this.portage.dest) {
        commands.push({
          description: `Granting ${grant.user} ${grant.permissions} permission on ${dest.host}.${dest.name}...`,
          file: this.tools.mysql,
          args: connectionArgs(dest),
          env: credentials(dest),
          stdin: {
            kind: 'sql',
            sql: grantSql(grant, dest.name, grant.password),
            display: grantSql(grant, dest.name, '****'),
          },
        });
      }
    }
    return commands;
  }

  /**
   * Feed the dump file into each destination, in configuration order.
   */
  loadCommands(inputFile: string): PlannedCommand[] {
    return this.portage.dest.map(
      (dest): PlannedCommand => ({
        description: `Loading ${inputFile} on ${dest.host}.${dest.name}...`,
        file: this.tools.mysql,
        args: [...connectionArgs(dest), dest.name],
        env: credentials(dest),
        stdin: { kind: 'file', path: inputFile },
      })
    );
  }

  updateCommands(): PlannedCommand[] {
    const commands: PlannedCommand[] = [];
    for (const script of this.portage.update) {
      for (const dest of this.portage.dest) {
        commands.push({
          description: `Applying ${script} to ${dest.host}.${dest.name}...`,
          file: this.tools.mysql,
          args: [...connectionArgs(dest), dest.name],
          env: credentials(dest),
          stdin: { kind: 'file', path: script },
        });
      }
    }
    return commands;
  }
}

/**
 * Shell-like one-liner for logs and dry runs. Contains no password.
 */
export function renderCommand(command: PlannedCommand): string {
  const line = [command.file, ...command.args].map(quoteArg).join(' ');
  if (!command.stdin) {
    return line;
  }
  if (command.stdin.kind === 'file') {
    return `${line} < ${quoteArg(command.stdin.path)}`;
  }
  return `${line} <<< ${quoteArg(command.stdin.display)}`;
}

export function quoteArg(value: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

export function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

function connectionArgs(connection: Connection): string[] {
  const args = [`--host=${connection.host}`];
  if (connection.port !== undefined) {
    args.push(`--port=${connection.port}`);
  }
  args.push(`--user=${connection.user}`);
  return args;
}

function credentials(connection: Connection): Record<string, string> {
  return { MYSQL_PWD: connection.password };
}

function grantSql(grant: UserGrant, database: string, password: string): string {
  const account = `${quoteString(grant.user)}@'%'`;
  return [
    `CREATE USER IF NOT EXISTS ${account} IDENTIFIED BY ${quoteString(password)};`,
    `ALTER USER ${account} IDENTIFIED BY ${quoteString(password)};`,
    `GRANT ${PERMISSION_GRANTS[grant.permissions]} ON ${quoteIdentifier(database)}.* TO ${account};`,
    'FLUSH PRIVILEGES;',
  ].join(' ');
}
