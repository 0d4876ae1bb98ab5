export { loadEnv, LogLevelSchema, type EnvConfig, type LogLevel } from './env-schema';
export {
  ScanOptionsSchema,
  resolveScanOptions,
  type ScanOptions,
  type ResolvedScanOptions,
} from './ScanConfig';
