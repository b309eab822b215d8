import { config as loadEnv } from 'dotenv';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { CategoryMap, ConnectionConfig, EnvironmentConfig, TableTarget } from '../types/index.js';
import { logger } from '../utils/logger.js';

export const ENVIRONMENTS = ['dev', 'qa', 'prod'] as const;
export type EnvironmentName = (typeof ENVIRONMENTS)[number];

/** Variable prefix per pipeline: <ENV>_INFORMATICA_DB_USER, <ENV>_PYTHON_DB_USER, ... */
const SIDE_PREFIX = { source: 'INFORMATICA', target: 'PYTHON' } as const;

const REQUIRED_PARAMS = ['USER', 'PASSWORD', 'HOST'] as const;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const connectionSchema = z
  .object({
    type: z.enum(['oracle', 'postgres']).default('oracle'),
    host: z.string().min(1),
    port: z.coerce.number().int().positive().optional(),
    database: z.string().min(1).optional(),
    sid: z.string().min(1).optional(),
    user: z.string().min(1),
    password: z.string().optional(),
    schema: z.string().min(1).optional(),
    tablePrefix: z.string().optional(),
  })
  .transform(c => ({ ...c, port: c.port ?? (c.type === 'oracle' ? 1521 : 5432) }))
  .refine(c => c.type !== 'oracle' || c.database !== undefined || c.sid !== undefined, {
    message: 'Oracle connections need a SERVICE or a SID',
  });

const categoriesSchema = z.object({
  categories: z.record(
    z.string(),
    z.array(
      z.object({
        table: z.string().min(1),
        keyColumns: z.array(z.string().min(1)).default([]),
      })
    )
  ),
});

const settingsSchema = z.object({
  batchSize: z.coerce.number().int().positive().default(1000),
  concurrency: z.coerce.number().int().positive().default(4),
  categoriesFile: z.string().default(path.join(process.cwd(), 'config', 'categories.json')),
});

export type Settings = z.infer<typeof settingsSchema>;

type Env = Record<string, string | undefined>;

const blankToUndefined = (value: string | undefined) => (value === undefined || value.trim() === '' ? undefined : value);

function readSide(env: Env, name: EnvironmentName, side: keyof typeof SIDE_PREFIX): ConnectionConfig {
  const prefix = `${name.toUpperCase()}_${SIDE_PREFIX[side]}_DB_`;
  const read = (param: string) => blankToUndefined(env[`${prefix}${param}`]);

  const missing = REQUIRED_PARAMS.filter(p => read(p) === undefined).map(p => `${prefix}${p}`);
  if (read('SERVICE') === undefined && read('SID') === undefined && (read('TYPE') ?? 'oracle') === 'oracle') {
    missing.push(`${prefix}SERVICE`);
  }
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(', ')}. Check your .env file.`,
      missing
    );
  }

  const parsed = connectionSchema.safeParse({
    type: read('TYPE'),
    host: read('HOST'),
    port: read('PORT'),
    database: read('SERVICE'),
    sid: read('SID'),
    user: read('USER'),
    password: read('PASSWORD'),
    schema: read('SCHEMA'),
    tablePrefix: read('TABLE_PREFIX'),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || prefix}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration for ${prefix}*: ${detail}`);
  }
  return parsed.data;
}

/** True when at least one variable of the environment is set. */
function isDeclared(env: Env, name: EnvironmentName): boolean {
  const upper = name.toUpperCase();
  return Object.values(SIDE_PREFIX).some(side =>
    Object.keys(env).some(key => key.startsWith(`${upper}_${side}_DB_`) && blankToUndefined(env[key]) !== undefined)
  );
}

export function listEnvironments(env: Env = process.env): EnvironmentName[] {
  return ENVIRONMENTS.filter(name => isDeclared(env, name));
}

export function isEnvironmentName(name: string): name is EnvironmentName {
  return (ENVIRONMENTS as readonly string[]).includes(name);
}

export function getEnvironment(name: string, env: Env = process.env): EnvironmentConfig {
  if (!isEnvironmentName(name)) {
    throw new ConfigError(`Invalid environment: ${name}. Expected one of ${ENVIRONMENTS.join(', ')}`);
  }
  return {
    name,
    source: readSide(env, name, 'source'),
    target: readSide(env, name, 'target'),
  };
}

export function loadSettings(env: Env = process.env): Settings {
  return settingsSchema.parse({
    batchSize: blankToUndefined(env.ETL_PARITY_BATCH_SIZE),
    concurrency: blankToUndefined(env.ETL_PARITY_CONCURRENCY),
    categoriesFile: blankToUndefined(env.ETL_PARITY_CATEGORIES),
  });
}

/** Loads `.env` from the working directory into process.env. */
export function loadDotEnv(): void {
  const result = loadEnv();
  if (result.error) {
    logger.debug('No .env file loaded, using process environment only');
  }
}

export async function loadCategories(file: string): Promise<CategoryMap> {
  if (!(await fs.pathExists(file))) {
    throw new ConfigError(`Category file not found: ${file}`);
  }
  const raw: unknown = await fs.readJson(file);
  const parsed = categoriesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid category file ${file}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  }
  return parsed.data.categories;
}

export interface TableSelection {
  category?: string;
  tables?: string[];
}

/**
 * Resolves which tables a comparison targets. Explicit tables win; a category
 * alone expands to all of its tables. Key columns come from the category file
 * when the table is listed there, otherwise the primary key is used at run time.
 */
export function resolveTables(
  categories: CategoryMap,
  selection: TableSelection,
  prefixes: { source?: string; target?: string } = {}
): TableTarget[] {
  const { category, tables } = selection;

  if (category !== undefined && !(category in categories)) {
    throw new ConfigError(`Unknown category: ${category}. Available: ${Object.keys(categories).join(', ')}`);
  }

  const lookup = (name: string) => {
    const scopes = category !== undefined ? [category] : Object.keys(categories);
    for (const scope of scopes) {
      const entry = categories[scope]?.find(t => t.table.toUpperCase() === name.toUpperCase());
      if (entry) return { category: scope, keyColumns: entry.keyColumns };
    }
    return undefined;
  };

  let names: string[];
  if (tables && tables.length > 0) {
    names = tables;
  } else if (category !== undefined) {
    names = (categories[category] ?? []).map(t => t.table);
  } else {
    throw new ConfigError('Select tables with --tables or a --category');
  }

  return names.map(name => {
    const found = lookup(name);
    return {
      name,
      ...(found && { category: found.category }),
      ...(found && found.keyColumns.length > 0 && { keyColumns: found.keyColumns }),
      ...(prefixes.source ? { sourceTable: `${prefixes.source}${name}` } : {}),
      ...(prefixes.target ? { targetTable: `${prefixes.target}${name}` } : {}),
    };
  });
}
