/**
 * One-run overrides of the stored encode settings
 */

import { setEncodeConfigValue, type EncodeConfig, type EncodeConfigKey } from '@vidshrink/core';

export interface EncodeOverrides {
  size?: string;
  fps?: string;
  encoder?: string;
  resolution?: string;
  preset?: string;
}

// Applied in this order
const OVERRIDE_KEYS: ReadonlyArray<readonly [keyof EncodeOverrides, EncodeConfigKey]> = [
  ['size', 'targetSizeMb'],
  ['fps', 'frameRate'],
  ['encoder', 'encoder'],
  ['resolution', 'resolution'],
  ['preset', 'preset'],
];

/**
 * Apply command line options on top of `config`. Throws ValidationError
 * on the first bad value.
 */
export function applyOverrides(config: EncodeConfig, overrides: EncodeOverrides): EncodeConfig {
  let result = config;
  for (const [option, key] of OVERRIDE_KEYS) {
    const value = overrides[option];
    if (value !== undefined) {
      result = setEncodeConfigValue(result, key, value);
    }
  }
  return result;
}
