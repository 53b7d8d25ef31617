import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
dotenv.config({ quiet: true });

export const D2_LAYOUTS = ['elk', 'dagre'] as const;
export const D2_FONTS = ['SourceSansPro', 'SourceCodePro', 'HandDrawn'] as const;

const ConfigSchema = z.object({
  d2: z.object({
    binPath: z.string().min(1).default('d2'),
    pad: z.number().int().min(0).max(1000).default(64),
    theme: z.number().int().default(0),
    sketch: z.boolean().default(false),
    font: z.enum(D2_FONTS).default('SourceSansPro'),
    layout: z.enum(D2_LAYOUTS).default('elk'),
    renderTimeout: z.number().int().min(1000).max(600000).default(30000),
  }),
  output: z.object({
    dir: z.string().min(1).default('docs'),
    title: z.string().min(1).default('Service Architecture'),
    globalName: z.string().min(1).default('Internal Services'),
  }),
  debug: z.object({
    verbose: z.boolean().default(false),
  }),
  app: z.object({
    name: z.string().default('servicescape'),
    version: z.string().default('0.1.0'),
  }),
});
type Config = z.infer<typeof ConfigSchema>;

const ENV_MAP: Record<string, string> = {
  SERVICESCAPE_D2_BIN: 'd2.binPath',
  SERVICESCAPE_D2_PAD: 'd2.pad',
  SERVICESCAPE_D2_THEME: 'd2.theme',
  SERVICESCAPE_D2_SKETCH: 'd2.sketch',
  SERVICESCAPE_D2_FONT: 'd2.font',
  SERVICESCAPE_D2_LAYOUT: 'd2.layout',
  SERVICESCAPE_RENDER_TIMEOUT: 'd2.renderTimeout',
  SERVICESCAPE_OUTPUT_DIR: 'output.dir',
  SERVICESCAPE_TITLE: 'output.title',
  SERVICESCAPE_GLOBAL_NAME: 'output.globalName',
  VERBOSE: 'debug.verbose',
};

type Coercer = (raw: string) => unknown;

const toNumber: Coercer = (raw) => {
  const n = parseInt(raw, 10);
  return isNaN(n) ? raw : n;
};
const toBoolean: Coercer = (raw) => raw.toLowerCase() === 'true';
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'd2.pad': toNumber,
  'd2.theme': toNumber,
  'd2.sketch': toBoolean,
  'd2.renderTimeout': toNumber,
  'debug.verbose': toBoolean,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const segments = dotPath.split('.');
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < segments.length - 1; i++) {
    const seg = segments[i];
    if (!seg) continue;
    const next = current[seg];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[seg] = created;
      current = created;
    }
  }
  const lastKey = segments.at(-1);
  if (lastKey) {
    current[lastKey] = value;
  }
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {
    d2: {},
    output: {},
    debug: {},
    app: {},
  };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined) continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }

  return config;
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return ConfigSchema.parse(loadConfigFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const summary = error.issues
        .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
    }
    throw error;
  }
}

export const CONFIG = createConfig();
