/**
 * Config module — re-exports presets, config loading and CLI flag merging.
 */
export type { ExportConfig, PresetName } from './presets.js';
export { ExportConfigSchema, ExportModeSchema, ThinkingStyleSchema, getPreset, loadConfig, parseUserConfig } from './presets.js';
export type { CliFormatFlags, ResolvedExportSettings } from './overrides.js';
export { applyCliFlags, resolveBaseConfig } from './overrides.js';
