/**
 * Tests for the portage configuration loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { ConfigError, describeConfig, loadConfig, parseConfig } from '../portage-config.js';

const minimalPortage = `
portages:
  - source: { host: src-host, user: root, password: test-secret, name: shop }
    dest:
      - { host: dst-host, user: root, password: test-secret, name: shop_copy }
`;

describe('parseConfig', () => {
  it('should apply defaults to a minimal portage', () => {
    const config = parseConfig(minimalPortage, '/configs');

    expect(config.portages).toHaveLength(1);
    expect(config.portages[0]).toEqual({
      name: 'shop@src-host',
      dbType: 'mysql',
      fetchData: true,
      ignoreTables: [],
      createDestDb: false,
      testUsers: [],
      source: { host: 'src-host', user: 'root', password: 'test-secret', name: 'shop' },
      dest: [{ host: 'dst-host', user: 'root', password: 'test-secret', name: 'shop_copy' }],
      update: [],
    });
  });

  it('should read every optional field', () => {
    const config = parseConfig(
      `
portages:
  - name: nightly
    db_type: mysql
    fetch_data: false
    ignore_tables: [logs, sessions]
    create_dest_db: true
    test_users:
      - { permissions: read, user: reporter, password: test-secret }
      - { permissions: admin, user: ops, password: 1234 }
    source: { host: src-host, port: 3307, user: root, password: test-secret, name: shop }
    dest:
      - { host: dst-a, user: root, password: test-secret, name: shop_a }
      - { host: dst-b, user: root, password: test-secret, name: shop_b }
    update: [fixups.sql, /abs/cleanup.sql]
`,
      '/configs'
    );

    const portage = config.portages[0];
    expect(portage.name).toBe('nightly');
    expect(portage.fetchData).toBe(false);
    expect(portage.ignoreTables).toEqual(['logs', 'sessions']);
    expect(portage.createDestDb).toBe(true);
    expect(portage.testUsers).toEqual([
      { permissions: 'read', user: 'reporter', password: 'test-secret' },
      { permissions: 'admin', user: 'ops', password: '1234' },
    ]);
    expect(portage.source.port).toBe(3307);
    expect(portage.dest.map(dest => dest.name)).toEqual(['shop_a', 'shop_b']);
    expect(portage.update).toEqual([
      path.resolve('/configs', 'fixups.sql'),
      path.resolve('/abs/cleanup.sql'),
    ]);
  });

  it('should accept a single destination mapping and a single update path', () => {
    const config = parseConfig(
      `
portages:
  - source: { host: src-host, user: root, password: test-secret, name: shop }
    dest: { host: dst-host, user: root, password: test-secret, name: shop_copy }
    update: fixups.sql
`,
      '/configs'
    );

    expect(config.portages[0].dest).toEqual([
      { host: 'dst-host', user: 'root', password: 'test-secret', name: 'shop_copy' },
    ]);
    expect(config.portages[0].update).toEqual([path.resolve('/configs', 'fixups.sql')]);
  });

  it('should treat empty YAML values as unset', () => {
    const config = parseConfig(`
portages:
  - ignore_tables:
    test_users:
    update:
    source:
      host: src-host
      user: root
      password:
      name: shop
    dest: { host: dst-host, user: root, password: test-secret, name: shop_copy }
`);

    expect(config.portages[0].ignoreTables).toEqual([]);
    expect(config.portages[0].testUsers).toEqual([]);
    expect(config.portages[0].update).toEqual([]);
    expect(config.portages[0].source.password).toBe('');
  });

  it('should reject an empty destination list', () => {
    expect(() =>
      parseConfig(`
portages:
  - source: { host: src-host, user: root, password: test-secret, name: shop }
    dest: []
`)
    ).toThrow('portages.0.dest: at least one destination is required');
  });

  it('should reject a missing destination', () => {
    expect(() =>
      parseConfig(`
portages:
  - source: { host: src-host, user: root, password: test-secret, name: shop }
`)
    ).toThrow(/portages\.0\.dest: Required/);
  });

  it('should reject a missing connection field', () => {
    expect(() =>
      parseConfig(`
portages:
  - source: { host: src-host, user: root, password: test-secret }
    dest: { host: dst-host, user: root, password: test-secret, name: shop_copy }
`)
    ).toThrow(/portages\.0\.source\.name: Required/);
  });

  it('should reject database types other than mysql', () => {
    expect(() =>
      parseConfig(`
portages:
  - db_type: postgres
    source: { host: src-host, user: root, password: test-secret, name: shop }
    dest: { host: dst-host, user: root, password: test-secret, name: shop_copy }
`)
    ).toThrow('portages.0.db_type: only mysql portages are supported');
  });

  it('should reject unknown permission levels', () => {
    expect(() =>
      parseConfig(`
portages:
  - create_dest_db: true
    test_users:
      - { permissions: superuser, user: ops, password: test-secret }
    source: { host: src-host, user: root, password: test-secret, name: shop }
    dest: { host: dst-host, user: root, password: test-secret, name: shop_copy }
`)
    ).toThrow('portages.0.test_users.0.permissions: permissions must be one of read, write, admin');
  });

  it('should reject unknown keys', () => {
    expect(() =>
      parseConfig(`
portages:
  - source: { host: src-host, user: root, password: test-secret, name: shop }
    dest: { host: dst-host, user: root, password: test-secret, name: shop_copy }
    fetch_everything: true
`)
    ).toThrow(/portages\.0: Unrecognized key\(s\) in object: 'fetch_everything'/);
  });

  it('should reject table names that are not identifiers', () => {
    expect(() =>
      parseConfig(`
portages:
  - ignore_tables: ['logs; DROP TABLE users']
    source: { host: src-host, user: root, password: test-secret, name: shop }
    dest: { host: dst-host, user: root, password: test-secret, name: shop_copy }
`)
    ).toThrow('portages.0.ignore_tables.0: invalid table name');
  });

  it('should reject a document without portages', () => {
    expect(() => parseConfig('portages: []')).toThrow(
      'portages: at least one portage is required'
    );
    expect(() => parseConfig('')).toThrow(ConfigError);
  });

  it('should wrap YAML syntax errors', () => {
    expect(() => parseConfig('portages: [unclosed')).toThrow(/^Could not parse configuration file/);
  });
});

describe('loadConfig', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(path.join(tmpdir(), 'portage-config-test-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should resolve update scripts against the configuration directory', async () => {
    const configPath = path.join(workDir, 'portage.yml');
    writeFileSync(configPath, `${minimalPortage}    update: fixups.sql\n`);

    const config = await loadConfig(configPath);

    expect(config.portages[0].update).toEqual([path.join(workDir, 'fixups.sql')]);
  });

  it('should fail with ConfigError when the file is missing', async () => {
    const missing = path.join(workDir, 'missing.yml');

    await expect(loadConfig(missing)).rejects.toThrow(ConfigError);
    await expect(loadConfig(missing)).rejects.toThrow(
      `Configuration file not found or unreadable: ${missing}`
    );
  });
});

describe('describeConfig', () => {
  it('should mask every password', () => {
    const config = parseConfig(`
portages:
  - create_dest_db: true
    test_users:
      - { permissions: write, user: app, password: test-secret }
    source: { host: src-host, user: root, password: test-secret, name: shop }
    dest: { host: dst-host, user: root, password: test-secret, name: shop_copy }
`);

    const described = describeConfig(config);

    expect(described).not.toContain('test-secret');
    expect(described.match(/"password": "\*\*\*\*"/g)).toHaveLength(3);
  });
});
