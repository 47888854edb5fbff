/**
 * Config module - configuration resolution
 */

export { resolveConfig, loadUserConfig, defaultUserConfigPath } from './resolve-config';
export type { CliFlags, ResolveConfigOptions } from './resolve-config';
