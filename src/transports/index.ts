/**
 * Transports for the standalone log sink
 *
 * - ConsoleTransport: Node.js stdout/stderr in pretty, compact or JSON form
 * - BaseTransport: starting point for custom destinations
 */

export { ConsoleTransport, createConsoleTransport } from './console-transport.js';
export {
  BaseTransport,
  Environment,
  Formatters,
  Colors,
  type ConsoleTransportConfig,
  type ConsoleFormatMode,
  type ConsoleMethodName
} from './transport-interface.js';
