/**
 * hostctl - cloud.yml configuration schema, validation and scaling
 * Library entry point
 */

export * from './types.js';
export * from './config/schema.js';
export { validateValue, validateRecord, matchesType, typeName } from './config/validator.js';
export { toJsonSchema, recordToJsonSchema, documentShapeSchema, type JsonSchema } from './config/json-schema.js';
export { DocumentValidator, type ShapeResult } from './config/document.js';
export {
  CloudConfig,
  CLOUD_CONFIG_SCHEMA,
  type CloudConfigValues,
  type CloudConfigField,
  type CloudConfigInput,
} from './config/cloud-config.js';
export { loadCloudConfig, loadCloudConfigOrDefault, interpolateEnv, type LoadOptions } from './config/loader.js';
export { CLOUD_CONFIG_FILENAME, resolveConfigPath } from './config/defaults.js';
export { parseScaleCliArgs, resolveScaleRequest, type ScaleCliArgs, type ScaleCliInput, type ScaleTypeHints } from './scale/params.js';
export { Logger, logger, type LogContext, type LogLevel, type LoggerOptions } from './observability/logger.js';
