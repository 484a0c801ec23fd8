/**
 * Configuration Types
 */

import { z } from 'zod';

const nonEmptyString = z
  .string({ invalid_type_error: 'must be non-empty string' })
  .refine(value => value.trim().length > 0, 'must be non-empty string');

const flag = z.boolean({ invalid_type_error: 'must be boolean value' });

/**
 * Shape of the configuration file after parsing.
 * Keys are checked in declaration order; the first failure is reported.
 */
export const AnalysisConfigSchema = z.object({
  package_name: nonEmptyString,
  repository_url: nonEmptyString,
  test_repository_mode: flag,
  ascii_tree_output: flag,
  reverse_dependencies: flag.default(false),
  graph_export: flag.default(false),
  output_dir: nonEmptyString.default('.')
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

/**
 * What the analyzer needs to run one analysis
 */
export interface AnalysisRequest {
  packageName: string;
  useTestMode: boolean;
  reverseMode: boolean;
  asciiTreeEnabled: boolean;
  graphExportEnabled: boolean;
  /** Directory the .dot file is written to when export is enabled */
  outputDir: string;
}

export const DEFAULT_CONFIG_PATH = 'config.toml';

/** Environment variable naming an alternative config file */
export const CONFIG_PATH_ENV = 'DEPGRAPH_CONFIG';
