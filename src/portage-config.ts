/**
 * Portage Configuration
 *
 * Loads the YAML file describing the portages to run and validates it into
 * typed objects. Unknown keys, missing fields and empty destination lists are
 * rejected here so nothing fails half way through a portage.
 *
 * Example:
 *
 *   portages:
 *     - fetch_data: true
 *       ignore_tables: [audit_log]
 *       create_dest_db: true
 *       test_users:
 *         - { permissions: read, user: reporter, password: test-secret }
 *       source: { host: db1, user: root, password: test-secret, name: shop }
 *       dest:
 *         - { host: db2, user: root, password: test-secret, name: shop_copy }
 *       update: fixups.sql
 */

import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { parse } from 'yaml';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const PERMISSION_LEVELS = ['read', 'write', 'admin'] as const;
export type Permission = (typeof PERMISSION_LEVELS)[number];

export interface Connection {
  host: string;
  port?: number;
  user: string;
  password: string;
  name: string;
}

export interface UserGrant {
  permissions: Permission;
  user: string;
  password: string;
}

export interface Portage {
  name: string;
  dbType: 'mysql';
  fetchData: boolean;
  ignoreTables: string[];
  createDestDb: boolean;
  testUsers: UserGrant[];
  source: Connection;
  dest: Connection[];
  /** Absolute paths of the scripts applied after loading, in order. */
  update: string[];
}

export interface PortageConfig {
  portages: Portage[];
}

const TABLE_NAME = /^[A-Za-z0-9_$]+$/;

// YAML turns `key:` with no value into null
const emptyToUndefined = (value: unknown) => (value === null ? undefined : value);
const singleToList = (value: unknown) =>
  value === null || value === undefined || Array.isArray(value) ? emptyToUndefined(value) : [value];

const secretSchema = z
  .union([z.string(), z.number()])
  .nullable()
  .transform(value => (value === null ? '' : String(value)));

const connectionSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535).optional(),
    user: z.string().min(1),
    password: secretSchema,
    name: z.string().min(1),
  })
  .strict();

const userGrantSchema = z
  .object({
    permissions: z.enum(PERMISSION_LEVELS, {
      errorMap: () => ({ message: `permissions must be one of ${PERMISSION_LEVELS.join(', ')}` }),
    }),
    user: z.string().min(1),
    password: secretSchema,
  })
  .strict();

const portageSchema = z
  .object({
    name: z.string().min(1).optional(),
    db_type: z.preprocess(
      emptyToUndefined,
      z
        .enum(['mysql'], { errorMap: () => ({ message: 'only mysql portages are supported' }) })
        .default('mysql')
    ),
    fetch_data: z.preprocess(emptyToUndefined, z.boolean().default(true)),
    ignore_tables: z.preprocess(
      emptyToUndefined,
      z.array(z.string().regex(TABLE_NAME, 'invalid table name')).default([])
    ),
    create_dest_db: z.preprocess(emptyToUndefined, z.boolean().default(false)),
    test_users: z.preprocess(emptyToUndefined, z.array(userGrantSchema).default([])),
    source: connectionSchema,
    dest: z.preprocess(
      singleToList,
      z.array(connectionSchema).min(1, 'at least one destination is required')
    ),
    update: z.preprocess(singleToList, z.array(z.string().min(1)).default([])),
  })
  .strict();

const configSchema = z
  .object({
    portages: z.array(portageSchema).min(1, 'at least one portage is required'),
  })
  .strict();

type RawPortage = z.infer<typeof portageSchema>;

/**
 * Validate already-read YAML text. Relative update paths resolve against `baseDir`.
 */
export function parseConfig(text: string, baseDir: string = process.cwd()): PortageConfig {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    throw new ConfigError(
      `Could not parse configuration file: ${error instanceof Error ? error.message : error}`,
      error instanceof Error ? error : undefined
    );
  }

  const result = configSchema.safeParse(document);
  if (!result.success) {
    const problems = result.error.issues.map(
      issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  return { portages: result.data.portages.map(raw => toPortage(raw, baseDir)) };
}

/**
 * Read and validate a configuration file.
 */
export async function loadConfig(path: string): Promise<PortageConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Configuration file not found or unreadable: ${path}`,
      error instanceof Error ? error : undefined
    );
  }
  return parseConfig(text, dirname(resolve(path)));
}

/**
 * Pretty JSON view of the configuration with every password masked.
 */
export function describeConfig(config: PortageConfig): string {
  return JSON.stringify(
    config,
    (key: string, value: unknown) => (key === 'password' ? '****' : value),
    2
  );
}

function toPortage(raw: RawPortage, baseDir: string): Portage {
  return {
    name: raw.name ?? `${raw.source.name}@${raw.source.host}`,
    dbType: raw.db_type,
    fetchData: raw.fetch_data,
    ignoreTables: raw.ignore_tables,
    createDestDb: raw.create_dest_db,
    testUsers: raw.test_users,
    source: raw.source,
    dest: raw.dest,
    update: raw.update.map(script => resolve(baseDir, script)),
  };
}
