/**
 * Configuration Loader
 *
 * Loads the flat TOML-style settings file, validates it and turns it into
 * an AnalysisRequest for the analyzer.
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { ConfigError, ConfigFileNotFoundError, InvalidConfigError, MissingConfigFieldError } from '../core/errors.js';
import { AnalysisConfigSchema, CONFIG_PATH_ENV, DEFAULT_CONFIG_PATH } from './types.js';
import type { AnalysisConfig, AnalysisRequest } from './types.js';

/**
 * Sample configuration written by `depgraph init`
 */
export const SAMPLE_CONFIG = `# Dependency analyzer configuration
package_name = "A"
repository_url = "https://example.com/packages"
test_repository_mode = false
ascii_tree_output = true

# Optional settings
reverse_dependencies = false
graph_export = false
output_dir = "."
`;

/**
 * Explicit path first, then $DEPGRAPH_CONFIG, then config.toml
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicit ?? env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;
}

function parseError(lineNo: number, reason: string): ConfigError {
  return new ConfigError(`Config parse error: line ${lineNo}: ${reason}`);
}

const BASIC_ESCAPES: Record<string, string> = {
  b: '\b',
  t: '\t',
  n: '\n',
  f: '\f',
  r: '\r',
  '"': '"',
  '\\': '\\'
};

/** Decimal integers and floats; underscores only between digits */
const NUMBER_PATTERN = /^[+-]?(0|[1-9](_?\d)*)(\.\d(_?\d)*)?([eE][+-]?\d(_?\d)*)?$/;

/**
 * Read a quoted string starting at index 0. Double-quoted strings decode
 * escapes; single-quoted strings are literal.
 */
function readString(str: string, lineNo: number): { value: string; end: number } {
  const quote = str[0];

  if (quote === "'") {
    const end = str.indexOf("'", 1);
    if (end === -1) {
      throw parseError(lineNo, 'unterminated string');
    }
    return { value: str.slice(1, end), end };
  }

  let value = '';
  for (let i = 1; i < str.length; i++) {
    const ch = str[i];
    if (ch === '"') {
      return { value, end: i };
    }
    if (ch !== '\\') {
      value += ch;
      continue;
    }

    const next = str[i + 1];
    if (next === 'u' || next === 'U') {
      const length = next === 'u' ? 4 : 8;
      const hex = str.slice(i + 2, i + 2 + length);
      const codePoint = parseInt(hex, 16);
      if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length !== length || codePoint > 0x10ffff) {
        throw parseError(lineNo, `invalid unicode escape '\\${next}${hex}'`);
      }
      value += String.fromCodePoint(codePoint);
      i += 1 + length;
      continue;
    }

    const decoded = next === undefined ? undefined : BASIC_ESCAPES[next];
    if (decoded === undefined) {
      throw parseError(lineNo, `invalid escape '\\${next ?? ''}'`);
    }
    value += decoded;
    i += 1;
  }

  throw parseError(lineNo, 'unterminated string');
}

/**
 * Parse a value string: quoted strings, booleans and decimal numbers.
 * Bare words are rejected, as in TOML.
 */
function parseValue(str: string, lineNo: number): unknown {
  if (str[0] === '"' || str[0] === "'") {
    const { value, end } = readString(str, lineNo);
    const rest = str.slice(end + 1).trim();
    if (rest !== '' && !rest.startsWith('#')) {
      throw parseError(lineNo, `unexpected text after string: ${rest}`);
    }
    return value;
  }

  // Trailing comment
  const hash = str.indexOf('#');
  const bare = (hash === -1 ? str : str.slice(0, hash)).trim();

  if (bare === 'true') return true;
  if (bare === 'false') return false;

  if (NUMBER_PATTERN.test(bare)) {
    return Number(bare.replace(/_/g, ''));
  }

  throw parseError(lineNo, `unsupported value '${bare}'`);
}

/**
 * Parse `key = value` lines into a plain record. Every key, `__proto__`
 * included, becomes an own property.
 */
export function parseConfig(content: string): Record<string, unknown> {
  const entries = new Map<string, unknown>();
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    const lineNo = index + 1;
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      return;
    }

    const eq = trimmed.indexOf('=');
    if (eq === -1) {
      throw parseError(lineNo, 'expected "key = value"');
    }

    const key = trimmed.slice(0, eq).trim();
    if (!key) {
      throw parseError(lineNo, 'missing key');
    }
    if (entries.has(key)) {
      throw parseError(lineNo, `duplicate key '${key}'`);
    }

    entries.set(key, parseValue(trimmed.slice(eq + 1).trim(), lineNo));
  });

  return Object.fromEntries(entries);
}

/**
 * ConfigLoader class
 */
export class ConfigLoader {
  /**
   * Load and validate a configuration file
   */
  load(path: string): AnalysisConfig {
    if (!existsSync(path)) {
      throw new ConfigFileNotFoundError(path);
    }

    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Config file reading error: ${error instanceof Error ? error.message : String(error)}`);
    }

    return this.validate(parseConfig(content));
  }

  /**
   * Check a parsed record against the schema; the first bad field wins
   */
  validate(raw: Record<string, unknown>): AnalysisConfig {
    const result = AnalysisConfigSchema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    const issue = result.error.issues[0];
    const field = String(issue.path[0] ?? '');
    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      throw new MissingConfigFieldError(field);
    }
    throw new InvalidConfigError(field, raw[field], issue.message);
  }

  toRequest(config: AnalysisConfig): AnalysisRequest {
    return {
      packageName: config.package_name,
      useTestMode: config.test_repository_mode,
      reverseMode: config.reverse_dependencies,
      asciiTreeEnabled: config.ascii_tree_output,
      graphExportEnabled: config.graph_export,
      outputDir: config.output_dir
    };
  }

  /**
   * Write the sample configuration. Returns false when the file exists and
   * `force` is not set.
   */
  createSample(path: string, force = false): boolean {
    if (existsSync(path) && !force) {
      return false;
    }
    writeFileSync(path, SAMPLE_CONFIG, 'utf-8');
    return true;
  }

  /**
   * Parameters as label/value pairs for display
   */
  describe(config: AnalysisConfig): Array<[string, string]> {
    return Object.entries(config).map(([key, value]): [string, string] => [key, String(value)]);
  }
}

export default ConfigLoader;
