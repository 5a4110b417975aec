/**
 * Encode Settings
 *
 * Persisted compression settings. Each job reads a fresh snapshot, so
 * edits made while a job runs only apply to the jobs that follow it.
 */

import { z } from 'zod';
import { safeReadFile, safeWriteFile } from '@vidshrink/utils';
import { ValidationError } from '../errors/index.js';
import { ENCODERS, PRESETS, RESOLUTIONS } from '../types/encoding.js';

export const encodeConfigSchema = z.object({
  targetSizeMb: z.number().int().positive().default(10),
  frameRate: z.number().int().positive().optional(),
  encoder: z.enum(ENCODERS).default('cpu'),
  resolution: z.enum(RESOLUTIONS).optional(),
  preset: z.enum(PRESETS).default('none'),
});

export type EncodeConfig = z.infer<typeof encodeConfigSchema>;

export type EncodeConfigKey = keyof EncodeConfig;

export const ENCODE_CONFIG_KEYS = encodeConfigSchema.keyof().options;

export const DEFAULT_ENCODE_CONFIG: EncodeConfig = encodeConfigSchema.parse({});

// Values that clear an optional setting
const UNSET_VALUES = new Set(['', 'none', 'original']);

export function isEncodeConfigKey(key: string): key is EncodeConfigKey {
  return ENCODE_CONFIG_KEYS.some((candidate) => candidate === key);
}

/**
 * Validate raw settings, filling in defaults
 */
export function parseEncodeConfig(raw: unknown): EncodeConfig {
  const result = encodeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      issue?.path.join('.') || 'config',
      issue?.message ?? 'invalid settings'
    );
  }
  return result.data;
}

/**
 * Load settings from a JSON file; a missing file gives the defaults
 */
export async function loadEncodeConfig(filePath: string): Promise<EncodeConfig> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    return { ...DEFAULT_ENCODE_CONFIG };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(filePath, error instanceof Error ? error.message : 'invalid JSON');
  }
  return parseEncodeConfig(raw);
}

export async function saveEncodeConfig(filePath: string, config: EncodeConfig): Promise<void> {
  await safeWriteFile(filePath, `${JSON.stringify(config, null, 2)}\n`);
}

/**
 * Apply a `key=value` edit given as text, e.g. from the command line
 */
export function setEncodeConfigValue(
  config: EncodeConfig,
  key: string,
  rawValue: string
): EncodeConfig {
  if (!isEncodeConfigKey(key)) {
    throw new ValidationError(key, `unknown setting, expected one of ${ENCODE_CONFIG_KEYS.join(', ')}`);
  }

  const value = rawValue.trim();
  let parsed: unknown;

  switch (key) {
    case 'targetSizeMb':
      parsed = Number(value);
      break;
    case 'frameRate':
      parsed = UNSET_VALUES.has(value.toLowerCase()) ? undefined : Number(value);
      break;
    case 'resolution':
      parsed = UNSET_VALUES.has(value.toLowerCase()) ? undefined : value.toLowerCase();
      break;
    case 'encoder':
    case 'preset':
      parsed = value.toLowerCase();
      break;
  }

  return parseEncodeConfig({ ...config, [key]: parsed });
}
