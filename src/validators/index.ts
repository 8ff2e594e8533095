/**
 * Validator Module
 */

export {
  validateRequest,
  type InboundRequest,
  type ValidationResult,
} from './RequestValidator';
