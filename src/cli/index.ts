/**
 * Tablesmith CLI
 *
 * Commander-based CLI with render and config subcommands.
 *
 *   tablesmith render data.csv --target pdf --max-rows 40
 *   tablesmith render https://example.com/data.csv --output out/table.png
 *   tablesmith config set render.fontSize 14
 */

import path from 'path';
import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import type { TablesmithConfig } from '../config/index.js';
import {
  ConfigurationError,
  NothingToPersistError,
  UnsupportedExportTargetError,
} from '../errors/index.js';
import { TableExporter } from '../pipeline/table-exporter.js';
import type { LoadOptions } from '../pipeline/table-exporter.js';
import { EXPORT_TARGETS, isExportTarget } from '../renderer/types.js';
import { isRemoteSource } from '../source/text-source.js';
import type { StyleSeed } from '../table/types.js';
import { ProgressReporter } from './progress.js';

export interface CliDependencies {
  configManager: ConfigManager;
  reporter: ProgressReporter;
}

export interface RenderCommandOptions {
  target?: string;
  output?: string;
  separator?: string;
  fontSize?: string;
  maxRows?: string;
  maxLength?: string;
  seed?: string;
}

function defaultDependencies(): CliDependencies {
  return { configManager: new ConfigManager(), reporter: new ProgressReporter() };
}

// ─── option parsing ──────────────────────────────────────────────────────────

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${flag} must be a positive integer, got: ${value}`);
  }
  return parsed;
}

function parseFontSize(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`--font-size must be a positive number, got: ${value}`);
  }
  return parsed;
}

function parseSeed(value: string): StyleSeed {
  if (value === 'random') return value;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`--seed must be an integer or "random", got: ${value}`);
  }
  return parsed;
}

/** `reports/q1.csv` → `q1`; URLs use the last path segment. */
export function sourceBaseName(source: string): string {
  const pathname = isRemoteSource(source) ? new URL(source).pathname : source;
  const name = path.basename(pathname, path.extname(pathname));
  return name || 'table';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a dotted key such as `render.fontSize`. */
export function getConfigValue(config: TablesmithConfig, key: string): unknown {
  let value: unknown = config;
  for (const part of key.split('.')) {
    if (!isRecord(value)) return undefined;
    value = value[part];
  }
  return value;
}

// ─── render ──────────────────────────────────────────────────────────────────

/**
 * Load a source, generate the artifact and write it.
 * Resolves to the path written.
 */
export async function runRender(
  source: string,
  options: RenderCommandOptions,
  deps: CliDependencies
): Promise<string> {
  const { reporter } = deps;
  const config = deps.configManager.loadWithEnvOverrides();

  const target = options.target ?? config.export.target;
  if (!isExportTarget(target)) {
    throw new UnsupportedExportTargetError(target);
  }

  const loadOptions: LoadOptions = {
    separator: options.separator ?? config.table.separator,
    maxFieldLength: options.maxLength !== undefined
      ? parsePositiveInt(options.maxLength, '--max-length')
      : config.table.maxFieldLength,
    styleSeed: options.seed !== undefined ? parseSeed(options.seed) : config.table.styleSeed,
    fontSize: options.fontSize !== undefined ? parseFontSize(options.fontSize) : config.render.fontSize,
    maxRowsPerUnit: options.maxRows !== undefined
      ? parsePositiveInt(options.maxRows, '--max-rows')
      : config.render.maxRowsPerUnit,
    exportTarget: target,
    metadata: { ...config.document },
  };

  reporter.startTask(`Loading ${source}`);
  const exporter = isRemoteSource(source)
    ? await TableExporter.fromUrl(source, loadOptions)
    : await TableExporter.fromFile(source, loadOptions);
  reporter.completeTask(
    `Loaded ${exporter.columns.length} column(s) and ${exporter.rows.length} row(s)`
  );
  const ragged = exporter.rows.filter((row) => row.values.length > exporter.columns.length).length;
  if (ragged > 0) {
    reporter.warn(`${ragged} row(s) have more fields than the header; extra fields are dropped`);
  }

  reporter.startTask(`Rendering ${target.toUpperCase()}`);
  const unsubscribe = exporter.state.onProgress((fraction) => reporter.logProgress(fraction));
  const artifact = await exporter.generate({ target }).finally(unsubscribe);
  reporter.logInfo(
    artifact.target === 'pdf'
      ? `${artifact.pageCount} page(s)`
      : `${artifact.width}x${artifact.height} px`
  );

  const output = options.output
    ?? path.join(config.export.outputDir, `${sourceBaseName(source)}.${EXPORT_TARGETS[target].fileExtension}`);
  const bytes = await exporter.write(output);
  if (!bytes) {
    throw new NothingToPersistError(undefined, { target });
  }
  reporter.completeTask(`Wrote ${bytes.length} bytes to ${output}`);
  return output;
}

export function renderCommand(deps: CliDependencies = defaultDependencies()): Command {
  const cmd = new Command('render');
  cmd
    .description('Render a delimited text file or URL to a PNG image or PDF document')
    .argument('<source>', 'File path or http(s) URL')
    .option('--target <png|pdf>', 'Output type (default: from config)')
    .option('--output <path>', 'Output file path (default: <outputDir>/<source name>.<ext>)')
    .option('--separator <char>', 'Field separator (default: from config)')
    .option('--font-size <number>', 'Font size in px (PNG) or pt (PDF)')
    .option('--max-rows <number>', 'Maximum rows per page or image strip')
    .option('--max-length <number>', 'Truncate longer fields and append "..."')
    .option('--seed <number|random>', 'Column colour seed')
    .action(async (source: string, options: RenderCommandOptions) => {
      try {
        await runRender(source, options, deps);
      } catch (err) {
        deps.reporter.failTask('Render', err);
        process.exitCode = 1;
      }
    });
  return cmd;
}

// ─── config ──────────────────────────────────────────────────────────────────

export function configCommand(deps: CliDependencies = defaultDependencies()): Command {
  const cmd = new Command('config');
  cmd.description('Manage Tablesmith configuration');
  const manager = deps.configManager;

  // config get [key]
  cmd
    .command('get [key]')
    .description('Show full config or a specific key')
    .action((key?: string) => {
      try {
        const config = manager.loadWithEnvOverrides();
        if (key) {
          const value = getConfigValue(config, key);
          console.log(value !== undefined ? JSON.stringify(value, null, 2) : `Key not found: ${key}`);
        } else {
          console.log(JSON.stringify(config, null, 2));
        }
      } catch (err) {
        deps.reporter.failTask('config get', err);
        process.exitCode = 1;
      }
    });

  // config set <key> <value>
  cmd
    .command('set <key> <value>')
    .description('Set a configuration key')
    .action((key: string, value: string) => {
      try {
        const tree: unknown = JSON.parse(JSON.stringify(manager.load()));
        const parts = key.split('.');
        let node: unknown = tree;
        for (const part of parts.slice(0, -1)) {
          if (!isRecord(node)) break;
          if (!isRecord(node[part])) node[part] = {};
          node = node[part];
        }
        if (!isRecord(node)) {
          throw new ConfigurationError(`Cannot set ${key}`);
        }
        const lastKey = parts[parts.length - 1];
        try {
          node[lastKey] = JSON.parse(value);
        } catch {
          node[lastKey] = value;
        }

        const next = manager.parse(JSON.stringify(tree));
        const { valid, errors } = manager.validate(next);
        if (!valid) {
          throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`);
        }
        manager.save(next);
        console.log(`✅ Set ${key} = ${value}`);
      } catch (err) {
        deps.reporter.failTask('config set', err);
        process.exitCode = 1;
      }
    });

  // config validate
  cmd
    .command('validate')
    .description('Validate the current configuration')
    .action(() => {
      try {
        const { valid, errors } = manager.validate(manager.loadWithEnvOverrides());
        if (valid) {
          console.log('✅ Configuration is valid');
        } else {
          console.error('❌ Configuration has errors:');
          for (const err of errors) {
            console.error(`  - ${err}`);
          }
          process.exitCode = 1;
        }
      } catch (err) {
        deps.reporter.failTask('config validate', err);
        process.exitCode = 1;
      }
    });

  // config reset
  cmd
    .command('reset')
    .description('Reset configuration to defaults')
    .action(() => {
      try {
        manager.save(ConfigManager.defaults());
        console.log('✅ Configuration reset to defaults');
      } catch (err) {
        deps.reporter.failTask('config reset', err);
        process.exitCode = 1;
      }
    });

  return cmd;
}

// ─── program factory ─────────────────────────────────────────────────────────

export function createProgram(deps: CliDependencies = defaultDependencies()): Command {
  const program = new Command();

  program
    .name('tablesmith')
    .description('Render delimited text tables to PNG images and PDF documents')
    .version('0.1.0');

  program.addCommand(renderCommand(deps));
  program.addCommand(configCommand(deps));

  return program;
}
