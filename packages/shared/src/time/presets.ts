import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { presetFileSchema, describeIssues } from '../schemas';
import type { FormatPreset, PresetTable } from '../types';

export const DEFAULT_PRESETS_FILE = fileURLToPath(new URL('../../data/presets.json', import.meta.url));

export function parsePresets(raw: unknown, source = 'presets'): PresetTable {
  const result = presetFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid format presets in ${source}: ${describeIssues(result.error)}`);
  }

  const table: Record<string, FormatPreset> = {};
  for (const [name, preset] of Object.entries(result.data)) {
    table[name] = { name, ...preset };
  }
  return Object.freeze(table);
}

/**
 * Named patterns are data: adding a preset means editing the JSON file,
 * or pointing WORLDCLOCK_PRESETS_FILE at another one.
 */
export function loadPresets(file: string = DEFAULT_PRESETS_FILE): PresetTable {
  return parsePresets(JSON.parse(readFileSync(file, 'utf8')), file);
}
