import type { ExportMode, FormatOptions } from '../types/index.js';
import { getPreset, loadConfig } from './presets.js';
import type { ExportConfig } from './presets.js';

/** Formatting flags as commander hands them over. A switch is undefined unless given on the command line. */
export interface CliFormatFlags {
  mode?: ExportMode;
  leaf?: string;
  thinking?: boolean;
  includeBash?: boolean;
  timestamps?: boolean;
  groupTurns?: boolean;
  preset?: string;
  config?: string;
}

export interface ResolvedExportSettings extends FormatOptions {
  mode: ExportMode;
  leafId?: string;
}

/**
 * `--preset` wins over `--config`; with neither, the `conversation` preset
 * applies and nothing is read from disk.
 */
export function resolveBaseConfig(flags: Pick<CliFormatFlags, 'preset' | 'config'>): ExportConfig {
  if (flags.preset) return getPreset(flags.preset);
  if (flags.config) return loadConfig(flags.config);
  return getPreset('conversation');
}

/** Apply CLI flags on top of a config. Any flag given on the command line wins. */
export function applyCliFlags(config: ExportConfig, flags: CliFormatFlags): ResolvedExportSettings {
  let thinkingStyle = config.thinking;
  if (flags.thinking !== undefined) thinkingStyle = flags.thinking ? 'details' : 'omit';

  return {
    mode: flags.mode ?? config.mode,
    leafId: flags.leaf || undefined,
    thinkingStyle,
    includeBash: flags.includeBash ?? config.includeBash,
    includeTimestamps: flags.timestamps ?? config.timestamps,
    groupTurns: flags.groupTurns ?? config.groupTurns,
  };
}
