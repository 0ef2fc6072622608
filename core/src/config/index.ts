/**
 * Printer configuration: defaults, validation and loading from YAML files or
 * environment variables.
 */

import { readFileSync, existsSync } from 'fs';
import { parse } from 'yaml';
import { ErrorCode, PrinterConfig, PrinterConfigInput } from '../types';
import { PrinterError } from '../utils/error-handler';
import { isRecord } from '../utils/payload';

export const DEFAULT_CONFIG: Omit<PrinterConfig, 'baseUrl'> = {
  timeoutMs: 60000,
  attachMinX: 0,
  attachMaxX: 0,
  attachMinY: 0,
  attachMaxY: 0,
  attachMinZ: 0,
  attachMaxZ: 0,
  zSpeedMmS: 8,
  maxRelativeZStep: 10,
  parkAfterHome: true,
  parkSpeedMmS: 20,
};

type NumericKey = {
  [K in keyof PrinterConfig]-?: PrinterConfig[K] extends number | undefined ? K : never;
}[keyof PrinterConfig];

const NUMERIC_KEYS: readonly NumericKey[] = [
  'timeoutMs',
  'attachMinX',
  'attachMaxX',
  'attachMinY',
  'attachMaxY',
  'attachMinZ',
  'attachMaxZ',
  'zSpeedMmS',
  'minSafeZ',
  'maxRelativeZStep',
  'parkSpeedMmS',
];

const POSITIVE_KEYS: readonly NumericKey[] = ['timeoutMs', 'zSpeedMmS', 'maxRelativeZStep', 'parkSpeedMmS'];

function invalidConfig(message: string, details?: unknown): PrinterError {
  return new PrinterError(ErrorCode.InvalidConfig, message, { details });
}

function isNumericKey(key: string): key is NumericKey {
  return NUMERIC_KEYS.some(k => k === key);
}

export function createPrinterConfig(input: PrinterConfigInput): PrinterConfig {
  const defined = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  );
  const config: PrinterConfig = { ...DEFAULT_CONFIG, ...defined, baseUrl: input.baseUrl };

  let url: URL;
  try {
    url = new URL(config.baseUrl);
  } catch {
    throw invalidConfig(`baseUrl '${config.baseUrl}' is not a valid URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw invalidConfig(`baseUrl must use http or https (got ${url.protocol})`);
  }

  for (const key of NUMERIC_KEYS) {
    const value = config[key];
    if (value !== undefined && !Number.isFinite(value)) {
      throw invalidConfig(`${key} must be a finite number (got ${value})`);
    }
  }
  for (const key of POSITIVE_KEYS) {
    const value = config[key];
    if (value !== undefined && value <= 0) {
      throw invalidConfig(`${key} must be > 0 (got ${value})`);
    }
  }

  return config;
}

const camelCase = (key: string) => key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());

/**
 * Maps a plain object (snake_case or camelCase keys) onto config fields.
 * Unknown keys are rejected so a misspelled attachment offset does not
 * silently fall back to 0.
 */
export function configFromObject(raw: Record<string, unknown>, source: string): Partial<PrinterConfig> {
  const config: Partial<PrinterConfig> = {};

  for (const [rawKey, value] of Object.entries(raw)) {
    const key = camelCase(rawKey);
    if (value === undefined || value === null) continue;

    if (isNumericKey(key)) {
      const parsed = typeof value === 'string' ? Number(value) : value;
      if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
        throw invalidConfig(`${source}: ${rawKey} must be a number (got ${String(value)})`);
      }
      config[key] = parsed;
    } else if (key === 'baseUrl' || key === 'apiKey') {
      if (typeof value !== 'string') {
        throw invalidConfig(`${source}: ${rawKey} must be a string`);
      }
      config[key] = value;
    } else if (key === 'parkAfterHome') {
      if (typeof value !== 'boolean') {
        throw invalidConfig(`${source}: ${rawKey} must be true or false`);
      }
      config.parkAfterHome = value;
    } else {
      throw invalidConfig(`${source}: unknown option '${rawKey}'`);
    }
  }

  return config;
}

export function loadConfigFile(path: string): Partial<PrinterConfig> {
  if (!existsSync(path)) {
    throw invalidConfig(`Config file not found: ${path}`);
  }
  const content = readFileSync(path, 'utf-8');
  const parsed: unknown = parse(content);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw invalidConfig(`${path}: expected a mapping of options`);
  }
  return configFromObject(parsed, path);
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<PrinterConfig> {
  return configFromObject(
    {
      baseUrl: env.PRINTER_URL,
      apiKey: env.PRINTER_API_KEY,
      timeoutMs: env.PRINTER_TIMEOUT_MS,
    },
    'environment'
  );
}

export function mergeConfig(...layers: Array<Partial<PrinterConfig>>): PrinterConfig {
  const merged: Partial<PrinterConfig> = {};
  for (const layer of layers) {
    Object.assign(merged, Object.fromEntries(
      Object.entries(layer).filter(([, value]) => value !== undefined)
    ));
  }
  if (!merged.baseUrl) {
    throw invalidConfig('baseUrl is required (set base_url, PRINTER_URL or --url)');
  }
  return createPrinterConfig({ ...merged, baseUrl: merged.baseUrl });
}
