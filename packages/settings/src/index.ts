/* c8 ignore file */
export { ValidationError, isValidationError } from './errors';
export { ReplacementMap } from './replace';
export {
  defaultPreferences,
  getPreferencesFilePath,
  loadPreferences,
  PREFERENCE_KEYS,
  preferencesFromUntyped
} from './preferences';
export type { Preferences } from './preferences';
export { applyReplaceArgument, defaultConfig, resolveConfig, usage } from './config';
export type { ResolvedConfig, Subcommand } from './config';
export { asMapping, formatValue, parseYamlDocument, readText, requireMapping } from './untyped';
export type { UntypedMapping } from './untyped';
