/**
 * Shared library utilities
 */
export {
  ConfigError,
  LookupError,
  PublishError,
  describeError,
  type PublishStage,
} from './errors';

export { Logger, createLogger } from './logger';
