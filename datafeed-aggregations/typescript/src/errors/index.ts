export { DatafeedError } from './error.js';
export {
  ConfigurationError,
  InvalidStateError,
  isConfigurationError,
  isInvalidStateError,
} from './categories.js';
export { Messages } from './messages.js';
