/**
 * Configuration Service
 *
 * Loads orchestrator settings from .city/config.yaml, validates them with zod
 * and merges every section over the defaults. A missing file means defaults.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import { formatIssues } from '../../core/validation.js';
import { DepartmentNameSchema, TerminationReasonSchema } from '../../core/schemas.js';

const positiveInt = z.number().int().positive();

const SupervisionSchema = z.object({
  tickIntervalMs: positiveInt.default(30_000),
  silenceWindowMs: positiveInt.default(60_000),
  restartThreshold: positiveInt.default(3),
  maxRestarts: z.number().int().nonnegative().default(3)
}).default({});

const PolicySchema = z.object({
  consolidation: z.object({
    approveSimilarity: z.number().min(0).max(100).default(70),
    approveSavings: z.number().nonnegative().default(100_000),
    deferSimilarity: z.number().min(0).max(100).default(50)
  }).default({}),
  termination: z.object({
    protectedDepartments: z.array(z.string().min(1))
      .default(['police', 'fire', 'health', 'emergency_dispatch_center']),
    approveReasons: z.array(TerminationReasonSchema).default(['redundant', 'obsolete', 'unused'])
  }).default({})
}).default({});

const CouncilSchema = z.object({
  name: DepartmentNameSchema.default('city_council'),
  decisionLeadDays: z.number().int().nonnegative().default(30),
  analysisIntervalMs: positiveInt.default(300_000),
  analysisMinDepartments: z.number().int().nonnegative().default(3),
  analyzers: z.array(DepartmentNameSchema).default(['doge', 'doge_vsm']),
  dispatchCenter: DepartmentNameSchema.default('emergency_dispatch_center'),
  changeDelayMs: z.number().int().nonnegative().default(0)
}).default({});

const DispatchSchema = z.object({
  name: DepartmentNameSchema.default('emergency_dispatch_center'),
  serviceWaitMs: positiveInt.default(30_000),
  defaultDepartment: DepartmentNameSchema.default('police_department')
}).default({});

const DepartmentsSchema = z.object({
  directory: z.string().min(1).default('.'),
  command: z.string().min(1).default('node'),
  args: z.array(z.string()).default(['generic_department.js', '{name}'])
}).default({});

const BusSchema = z.object({
  transport: z.enum(['memory', 'redis']).default('memory'),
  url: z.string().min(1).default('redis://localhost:6379'),
  channelPrefix: z.string().default('city')
}).default({});

/**
 * Full configuration schema
 */
export const CityConfigSchema = z.object({
  supervision: SupervisionSchema,
  policy: PolicySchema,
  council: CouncilSchema,
  dispatch: DispatchSchema,
  departments: DepartmentsSchema,
  bus: BusSchema
});

export type CityConfig = z.infer<typeof CityConfigSchema>;
export type PolicyConfig = CityConfig['policy'];
export type BusConfig = CityConfig['bus'];

/**
 * Configuration as written in the YAML file (every key optional)
 */
export type CityConfigInput = z.input<typeof CityConfigSchema>;

/**
 * Build a complete configuration from a partial one
 */
export function resolveConfig(input: CityConfigInput = {}): CityConfig {
  const result = CityConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Configuration Service
 *
 * Provides access to configuration values from .city/config.yaml
 * with defaults when configuration is not present.
 */
export class ConfigService {
  private configPath: string;
  private cachedConfig: CityConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.configPath = path.join(options.baseDir || '.city', 'config.yaml');
  }

  /**
   * Load configuration from file, with caching
   */
  async load(): Promise<CityConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string | null;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        content = null;
      } else {
        throw new ConfigError(`Cannot read ${this.configPath}: ${describe(error)}`);
      }
    }

    let parsed: unknown = {};
    if (content !== null) {
      try {
        parsed = yaml.parse(content) ?? {};
      } catch (error) {
        throw new ConfigError(`Invalid YAML in ${this.configPath}: ${describe(error)}`);
      }
    }

    const result = CityConfigSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration in ${this.configPath}: ${formatIssues(result.error)}`, {
        path: this.configPath
      });
    }

    this.cachedConfig = result.data;
    return result.data;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
