export {
  PiiDetector,
  piiDetector,
  buildPiiResult,
  computePiiSeverity,
} from './detector.js'
export { PII_DEFINITIONS, HIGH_RISK_PII_TYPES } from './patterns.js'
export { redactValue, maskWindow, type TextSpan } from './redaction.js'
export { isValidSsn, passesLuhn, isPlausibleEmail } from './validators.js'
export {
  PII_TYPES,
  type PiiType,
  type PiiSeverity,
  type PiiDetection,
  type PiiResult,
  type PiiTypeDefinition,
  type PiiDetectorOptions,
} from './types.js'
