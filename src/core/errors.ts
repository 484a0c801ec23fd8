/**
 * Custom Error Classes for depgraph
 */

import type { PackageId } from '../graph/types.js';

/**
 * Error thrown when a package recurs within its own ancestor chain
 */
export class CircularDependencyError extends Error {
  public readonly package: PackageId;
  public readonly path: readonly PackageId[];

  constructor(pkg: PackageId, path: readonly PackageId[]) {
    super(`Circular dependency: ${[...path, pkg].join(' -> ')}`);
    this.name = 'CircularDependencyError';
    this.package = pkg;
    this.path = [...path];

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CircularDependencyError);
    }
  }
}

/**
 * Error thrown when a graph description cannot be written to disk
 */
export class GraphExportError extends Error {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write graph description to ${path}: ${reason}`, { cause });
    this.name = 'GraphExportError';
    this.path = path;
  }
}

/**
 * Base class for configuration problems
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConfigFileNotFoundError extends ConfigError {
  public readonly configPath: string;

  constructor(configPath: string) {
    super(`Config file not found: ${configPath}`);
    this.name = 'ConfigFileNotFoundError';
    this.configPath = configPath;
  }
}

export class MissingConfigFieldError extends ConfigError {
  public readonly field: string;

  constructor(field: string) {
    super(`Missing required config field: ${field}`);
    this.name = 'MissingConfigFieldError';
    this.field = field;
  }
}

export class InvalidConfigError extends ConfigError {
  public readonly field: string;
  public readonly value: unknown;
  public readonly reason: string;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid value '${String(value)}' for field '${field}': ${reason}`);
    this.name = 'InvalidConfigError';
    this.field = field;
    this.value = value;
    this.reason = reason;
  }
}
