export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { type LoadSettingsOptions, loadSettings, SettingsValidationError } from "./core/load"
export type { ISettings } from "./ports/settings"
export type { SettingsSource } from "./ports/source"
