/**
 * CLI action handlers.
 */

export {
  handleInspectAction,
  resolveDiagnosticLevel,
  type ActionIO,
  type InspectActionOptions,
} from './inspect.js';
