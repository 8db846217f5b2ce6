export * from './transpiler';
export * from './proptypes';
export * from './element';
export * from './renderer';
export * from './errors';
export {
  DEFAULT_CONFIG,
  getConfig,
  isStrictMode,
  resolveConfig,
  setStrictMode,
  withConfig,
  withStrictMode,
  type ValidationConfig
} from './config';
export { NotProvided, Unset, isNotProvided, isSupplied } from './sentinels';
