export * from './schema';
export { parseConfig, parseServerConfig, loadConfigFromEnv, resolvePlaceholders } from './loader';
