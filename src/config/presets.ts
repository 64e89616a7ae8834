/**
 * Export configuration for session-md.
 *
 * Controls the defaults for every formatting switch the CLI exposes. Without
 * `--preset` or `--config` the built-in `conversation` preset applies; no file
 * is read implicitly.
 *
 * A config file may override any subset of fields; unspecified fields inherit
 * from the preset it names (or `conversation`). CLI flags are applied on top.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import YAML from 'yaml';
import { ConfigFileError } from '../errors.js';
import { logger } from '../logger.js';

// ── Zod Schema ──────────────────────────────────────────────────────────────

export const ExportModeSchema = z.enum(['all', 'branch']);
export const ThinkingStyleSchema = z.enum(['details', 'omit']);
const PresetNameSchema = z.enum(['conversation', 'minimal', 'full']);

export const ExportConfigSchema = z.object({
  preset: PresetNameSchema.default('conversation'),
  mode: ExportModeSchema.default('all'),
  thinking: ThinkingStyleSchema.default('details'),
  includeBash: z.boolean().default(false),
  timestamps: z.boolean().default(false),
  groupTurns: z.boolean().default(true),
});

export type PresetName = z.infer<typeof PresetNameSchema>;
export type ExportConfig = z.infer<typeof ExportConfigSchema>;

// ── Presets ──────────────────────────────────────────────────────────────────

/** Conversation with reasoning folded away. */
const CONVERSATION_PRESET: ExportConfig = {
  preset: 'conversation',
  mode: 'all',
  thinking: 'details',
  includeBash: false,
  timestamps: false,
  groupTurns: true,
};

/** Just what was said. */
const MINIMAL_PRESET: ExportConfig = {
  preset: 'minimal',
  mode: 'all',
  thinking: 'omit',
  includeBash: false,
  timestamps: false,
  groupTurns: true,
};

/** Everything the exporter can show, including shell runs and times. */
const FULL_PRESET: ExportConfig = {
  preset: 'full',
  mode: 'all',
  thinking: 'details',
  includeBash: true,
  timestamps: true,
  groupTurns: true,
};

const PRESETS: Record<PresetName, ExportConfig> = {
  conversation: CONVERSATION_PRESET,
  minimal: MINIMAL_PRESET,
  full: FULL_PRESET,
};

function isPresetName(name: string): name is PresetName {
  return PresetNameSchema.safeParse(name).success;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Public API ──────────────────────────────────────────────────────────────

/** Get a built-in preset by name. Throws on unknown preset. */
export function getPreset(name: string): ExportConfig {
  if (!isPresetName(name)) {
    throw new Error(`Unknown preset "${name}". Valid presets: ${Object.keys(PRESETS).join(', ')}`);
  }
  return { ...PRESETS[name] };
}

/**
 * Validate raw user YAML/JSON data into an ExportConfig. Unknown fields are
 * stripped; an invalid config falls back to its preset.
 */
export function parseUserConfig(raw: unknown): ExportConfig {
  if (!isPlainObject(raw)) {
    logger.warn('Config file is not a plain object, using conversation preset');
    return getPreset('conversation');
  }

  const presetName = typeof raw.preset === 'string' && isPresetName(raw.preset) ? raw.preset : 'conversation';
  const base = getPreset(presetName);

  const result = ExportConfigSchema.safeParse({ ...base, ...raw, preset: presetName });
  if (result.success) {
    return result.data;
  }

  logger.warn('Config validation errors, falling back to preset defaults: %s', result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  return base;
}

/** Read the YAML file named by `--config`. Throws ConfigFileError when it is missing or unparsable. */
export function loadConfig(configPath: string): ExportConfig {
  const filePath = path.resolve(configPath);
  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigFileError(filePath, err instanceof Error ? err.message : String(err));
  }
  logger.info('Loaded config from %s', filePath);
  return parseUserConfig(raw);
}
