/**
 * Runtime support for instrumented classes
 *
 * - MethodLogger: the contract generated wrappers call
 * - ValueFormatter / MessageTemplate: bounded rendering of log messages
 * - TypeFilter: namespace and class include/exclude lists
 * - attachMethodLogger: injects a logger into an instrumented instance
 */

export {
  MethodLoggerImpl,
  createMethodLogger,
  PARAM_PLACEHOLDER_PREFIX,
  OMITTED_VALUE,
  type MethodLogger
} from './method-logger.js';
export {
  METHOD_LOGGER,
  LOGGED_TYPE,
  isMethodLoggerAware,
  attachMethodLogger,
  type MethodLoggerAware
} from './method-logger-aware.js';
export {
  DEFAULT_RUNTIME_OPTIONS,
  createRuntimeOptions,
  type RuntimeOptions,
  type RuntimeOptionsInput
} from './runtime-options.js';
export { TypeFilter, compileClassPattern, type LoggedTypeInfo } from './type-filter.js';
export { MessageTemplate, tokenizeTemplate, type TemplateSegment } from './message-template.js';
export { ValueFormatter, describeType, type FormatLimits } from './value-formatter.js';
export { startStopwatch, clipValue, type Stopwatch } from './wrapper-support.js';
