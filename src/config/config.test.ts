/**
 * Configuration Tests
 *
 * ConfigManager: load / parse / save / validate / env overrides
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs';
import { ConfigManager } from './config.js';
import type { TablesmithConfig } from './config.js';
import { ConfigurationError } from '../errors/index.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

let counter = 0;

function tmpConfigPath(): string {
  counter += 1;
  return path.join(os.tmpdir(), `tablesmith-test-${process.pid}-${Date.now()}-${counter}.json`);
}

function makeConfig(overrides: Partial<TablesmithConfig> = {}): TablesmithConfig {
  return {
    table: { separator: ';', maxFieldLength: 40 },
    render: { fontSize: 10, maxRowsPerUnit: 50 },
    export: { target: 'pdf', outputDir: '/tmp/tables' },
    document: { author: 'Finance', title: 'Ledger' },
    ...overrides,
  };
}

const ENV_VARS = [
  'TABLESMITH_SEPARATOR',
  'TABLESMITH_MAX_FIELD_LENGTH',
  'TABLESMITH_STYLE_SEED',
  'TABLESMITH_FONT_SIZE',
  'TABLESMITH_MAX_ROWS',
  'TABLESMITH_TARGET',
  'TABLESMITH_OUTPUT_DIR',
  'TABLESMITH_PDF_AUTHOR',
  'TABLESMITH_PDF_TITLE',
];

// ─── ConfigManager.load ───────────────────────────────────────────────────────

describe('ConfigManager.load', () => {
  it('returns defaults when config file does not exist', () => {
    const mgr = new ConfigManager(tmpConfigPath());
    const config = mgr.load();
    expect(config.table.separator).toBe(',');
    expect(config.render.fontSize).toBe(12);
    expect(config.export.target).toBe('png');
    expect(config.document).toEqual({ author: 'Author', title: 'Title' });
  });

  it('loads config from a JSON file', () => {
    const configPath = tmpConfigPath();
    fs.writeFileSync(configPath, JSON.stringify(makeConfig()), 'utf-8');
    const loaded = new ConfigManager(configPath).load();
    expect(loaded).toEqual(makeConfig());
    fs.unlinkSync(configPath);
  });

  it('fills sections missing from the file with defaults', () => {
    const configPath = tmpConfigPath();
    fs.writeFileSync(configPath, JSON.stringify({ render: { fontSize: 18 } }), 'utf-8');
    const loaded = new ConfigManager(configPath).load();
    expect(loaded.render.fontSize).toBe(18);
    expect(loaded.table.separator).toBe(',');
    expect(loaded.export.target).toBe('png');
    fs.unlinkSync(configPath);
  });

  it('throws on malformed JSON', () => {
    const configPath = tmpConfigPath();
    fs.writeFileSync(configPath, 'not json at all', 'utf-8');
    const mgr = new ConfigManager(configPath);
    expect(() => mgr.load()).toThrow(ConfigurationError);
    expect(() => mgr.load()).toThrow(/Failed to read config/);
    fs.unlinkSync(configPath);
  });
});

// ─── ConfigManager.save ──────────────────────────────────────────────────────

describe('ConfigManager.save', () => {
  it('writes config JSON to disk and re-reads it', () => {
    const configPath = tmpConfigPath();
    const mgr = new ConfigManager(configPath);
    mgr.save(makeConfig());
    expect(mgr.load()).toEqual(makeConfig());
    expect(fs.readFileSync(configPath, 'utf-8').endsWith('}\n')).toBe(true);
    fs.unlinkSync(configPath);
  });

  it('creates parent directory if it does not exist', () => {
    const dir = path.join(os.tmpdir(), `tablesmith-dir-${process.pid}-${Date.now()}`);
    const configPath = path.join(dir, 'config.json');
    new ConfigManager(configPath).save(makeConfig());
    expect(fs.existsSync(configPath)).toBe(true);
    fs.rmSync(dir, { recursive: true });
  });
});

// ─── ConfigManager.validate ──────────────────────────────────────────────────

describe('ConfigManager.validate', () => {
  const mgr = new ConfigManager('/tmp/dummy.json');

  it('returns valid for a complete config', () => {
    const result = mgr.validate(makeConfig());
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it('accepts the defaults', () => {
    expect(mgr.validate(ConfigManager.defaults()).valid).toBe(true);
  });

  it('reports every missing section', () => {
    const result = mgr.validate({});
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'table.separator must be a non-empty string',
      'render.fontSize must be a positive number',
      'export.target must be png | pdf, got: undefined',
      'export.outputDir is required',
    ]);
  });

  it('rejects an empty separator', () => {
    const result = mgr.validate(makeConfig({ table: { separator: '' } }));
    expect(result.errors).toEqual(['table.separator must be a non-empty string']);
  });

  it('rejects a fractional field length and row limit', () => {
    const result = mgr.validate(
      makeConfig({
        table: { separator: ',', maxFieldLength: 2.5 },
        render: { fontSize: 12, maxRowsPerUnit: 0 },
      })
    );
    expect(result.errors).toEqual([
      'table.maxFieldLength must be a positive integer',
      'render.maxRowsPerUnit must be a positive integer',
    ]);
  });

  it('accepts "random" and integer style seeds', () => {
    expect(mgr.validate(makeConfig({ table: { separator: ',', styleSeed: 'random' } })).valid).toBe(true);
    expect(mgr.validate(makeConfig({ table: { separator: ',', styleSeed: -7 } })).valid).toBe(true);
    expect(mgr.validate(makeConfig({ table: { separator: ',', styleSeed: 1.5 } })).errors).toEqual([
      'table.styleSeed must be an integer or "random"',
    ]);
  });

  it('rejects an unknown export target', () => {
    const config = mgr.parse('{"export":{"target":"gif"}}');
    expect(mgr.validate(config).errors).toEqual(['export.target must be png | pdf, got: gif']);
  });
});

// ─── ConfigManager.loadWithEnvOverrides ──────────────────────────────────────

describe('ConfigManager.loadWithEnvOverrides', () => {
  let configPath: string;

  beforeEach(() => {
    configPath = tmpConfigPath();
    new ConfigManager(configPath).save(makeConfig());
  });

  afterEach(() => {
    if (fs.existsSync(configPath)) fs.unlinkSync(configPath);
    for (const name of ENV_VARS) delete process.env[name];
  });

  it('env TABLESMITH_SEPARATOR overrides the separator', () => {
    process.env.TABLESMITH_SEPARATOR = '|';
    const config = new ConfigManager(configPath).loadWithEnvOverrides();
    expect(config.table.separator).toBe('|');
  });

  it('env TABLESMITH_STYLE_SEED accepts random or an integer', () => {
    process.env.TABLESMITH_STYLE_SEED = 'random';
    expect(new ConfigManager(configPath).loadWithEnvOverrides().table.styleSeed).toBe('random');
    process.env.TABLESMITH_STYLE_SEED = '99';
    expect(new ConfigManager(configPath).loadWithEnvOverrides().table.styleSeed).toBe(99);
  });

  it('env TABLESMITH_FONT_SIZE and TABLESMITH_MAX_ROWS override rendering', () => {
    process.env.TABLESMITH_FONT_SIZE = '9.5';
    process.env.TABLESMITH_MAX_ROWS = '25';
    const config = new ConfigManager(configPath).loadWithEnvOverrides();
    expect(config.render).toEqual({ fontSize: 9.5, maxRowsPerUnit: 25 });
  });

  it('env TABLESMITH_TARGET ignores unknown targets', () => {
    process.env.TABLESMITH_TARGET = 'gif';
    expect(new ConfigManager(configPath).loadWithEnvOverrides().export.target).toBe('pdf');
    process.env.TABLESMITH_TARGET = 'png';
    expect(new ConfigManager(configPath).loadWithEnvOverrides().export.target).toBe('png');
  });

  it('env TABLESMITH_OUTPUT_DIR overrides outputDir', () => {
    process.env.TABLESMITH_OUTPUT_DIR = '/custom/output';
    const config = new ConfigManager(configPath).loadWithEnvOverrides();
    expect(config.export.outputDir).toBe('/custom/output');
  });

  it('env TABLESMITH_PDF_AUTHOR and TABLESMITH_PDF_TITLE override metadata', () => {
    process.env.TABLESMITH_PDF_AUTHOR = 'Ops';
    process.env.TABLESMITH_PDF_TITLE = 'Inventory';
    const config = new ConfigManager(configPath).loadWithEnvOverrides();
    expect(config.document).toEqual({ author: 'Ops', title: 'Inventory' });
  });

  it('ignores a non-numeric TABLESMITH_MAX_FIELD_LENGTH', () => {
    process.env.TABLESMITH_MAX_FIELD_LENGTH = 'lots';
    const config = new ConfigManager(configPath).loadWithEnvOverrides();
    expect(config.table.maxFieldLength).toBe(40);
  });
});

// ─── ConfigManager.defaults ──────────────────────────────────────────────────

describe('ConfigManager.defaults', () => {
  it('returns a complete config with required fields', () => {
    const d = ConfigManager.defaults();
    expect(d.table.separator).toBe(',');
    expect(d.render.fontSize).toBe(12);
    expect(d.export.outputDir).toBe(path.join(os.homedir(), 'tablesmith-output'));
  });

  it('returns a fresh object each call', () => {
    const a = ConfigManager.defaults();
    a.table.separator = ';';
    expect(ConfigManager.defaults().table.separator).toBe(',');
  });
});
