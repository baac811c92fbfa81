/**
 * Tablesmith Configuration System
 *
 * Manages config file at ~/.tablesmith/config.json.
 * Supports environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigurationError } from '../errors/index.js';
import type { ExportTarget } from '../renderer/types.js';
import { isExportTarget } from '../renderer/types.js';
import type { StyleSeed } from '../table/types.js';

export interface TablesmithConfig {
  table: {
    /** Default: ',' */
    separator: string;
    /** Data fields longer than this are cut and suffixed with '...' */
    maxFieldLength?: number;
    /** Number, or 'random'. Default: derived from column names */
    styleSeed?: StyleSeed;
  };
  render: {
    /** Default: 12 */
    fontSize: number;
    /** Rows per page/strip. Unset puts every row in one unit */
    maxRowsPerUnit?: number;
  };
  export: {
    /** Default: 'png' */
    target: ExportTarget;
    /** Default: ~/tablesmith-output */
    outputDir: string;
  };
  document: {
    /** Default: 'Author' */
    author: string;
    /** Default: 'Title' */
    title: string;
  };
}

/** Parse an integer env var; undefined when unset or not a number. */
function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.tablesmith', 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): TablesmithConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    try {
      return this.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.configPath }
      );
    }
  }

  /**
   * Parse a JSON config document and merge it over the defaults.
   */
  parse(raw: string): TablesmithConfig {
    const parsed = JSON.parse(raw) as Partial<TablesmithConfig>;
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: TablesmithConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. Returns errors array, empty when valid.
   */
  validate(config: Partial<TablesmithConfig>): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const separator = config.table?.separator;
    if (typeof separator !== 'string' || separator.length === 0) {
      errors.push('table.separator must be a non-empty string');
    }

    const maxFieldLength = config.table?.maxFieldLength;
    if (maxFieldLength !== undefined && !isPositiveInteger(maxFieldLength)) {
      errors.push('table.maxFieldLength must be a positive integer');
    }

    const seed = config.table?.styleSeed;
    if (seed !== undefined && seed !== 'random' && !(typeof seed === 'number' && Number.isInteger(seed))) {
      errors.push('table.styleSeed must be an integer or "random"');
    }

    const fontSize = config.render?.fontSize;
    if (typeof fontSize !== 'number' || !Number.isFinite(fontSize) || fontSize <= 0) {
      errors.push('render.fontSize must be a positive number');
    }

    const maxRows = config.render?.maxRowsPerUnit;
    if (maxRows !== undefined && !isPositiveInteger(maxRows)) {
      errors.push('render.maxRowsPerUnit must be a positive integer');
    }

    const target = config.export?.target;
    if (typeof target !== 'string' || !isExportTarget(target)) {
      errors.push(`export.target must be png | pdf, got: ${String(target)}`);
    }

    if (!config.export?.outputDir) {
      errors.push('export.outputDir is required');
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   TABLESMITH_SEPARATOR, TABLESMITH_MAX_FIELD_LENGTH, TABLESMITH_STYLE_SEED,
   *   TABLESMITH_FONT_SIZE, TABLESMITH_MAX_ROWS,
   *   TABLESMITH_TARGET, TABLESMITH_OUTPUT_DIR,
   *   TABLESMITH_PDF_AUTHOR, TABLESMITH_PDF_TITLE
   */
  loadWithEnvOverrides(): TablesmithConfig {
    const config = this.load();

    // Table
    if (process.env.TABLESMITH_SEPARATOR) config.table.separator = process.env.TABLESMITH_SEPARATOR;
    const maxFieldLength = envInt('TABLESMITH_MAX_FIELD_LENGTH');
    if (maxFieldLength !== undefined) config.table.maxFieldLength = maxFieldLength;
    const seed = process.env.TABLESMITH_STYLE_SEED;
    if (seed === 'random') {
      config.table.styleSeed = 'random';
    } else {
      const numeric = envInt('TABLESMITH_STYLE_SEED');
      if (numeric !== undefined) config.table.styleSeed = numeric;
    }

    // Render
    if (process.env.TABLESMITH_FONT_SIZE) {
      const fontSize = parseFloat(process.env.TABLESMITH_FONT_SIZE);
      if (!Number.isNaN(fontSize)) config.render.fontSize = fontSize;
    }
    const maxRows = envInt('TABLESMITH_MAX_ROWS');
    if (maxRows !== undefined) config.render.maxRowsPerUnit = maxRows;

    // Export
    const target = process.env.TABLESMITH_TARGET;
    if (target && isExportTarget(target)) config.export.target = target;
    if (process.env.TABLESMITH_OUTPUT_DIR) config.export.outputDir = process.env.TABLESMITH_OUTPUT_DIR;

    // Document
    if (process.env.TABLESMITH_PDF_AUTHOR) config.document.author = process.env.TABLESMITH_PDF_AUTHOR;
    if (process.env.TABLESMITH_PDF_TITLE) config.document.title = process.env.TABLESMITH_PDF_TITLE;

    return config;
  }

  /**
   * Return a default configuration with safe fallback values.
   */
  static defaults(): TablesmithConfig {
    return {
      table: {
        separator: ',',
      },
      render: {
        fontSize: 12,
      },
      export: {
        target: 'png',
        outputDir: path.join(os.homedir(), 'tablesmith-output'),
      },
      document: {
        author: 'Author',
        title: 'Title',
      },
    };
  }

  /** Deep-merge source into target (non-destructive). */
  private merge(target: TablesmithConfig, source: Partial<TablesmithConfig>): TablesmithConfig {
    const result = { ...target };
    if (source.table) result.table = { ...target.table, ...source.table };
    if (source.render) result.render = { ...target.render, ...source.render };
    if (source.export) result.export = { ...target.export, ...source.export };
    if (source.document) result.document = { ...target.document, ...source.document };
    return result;
  }
}
