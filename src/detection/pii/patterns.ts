import type { PiiType, PiiTypeDefinition } from './types.js'
import { isPlausibleEmail, isValidSsn, passesLuhn } from './validators.js'

/**
 * PII type table. Every pattern is global and case-insensitive.
 *
 * Types without a validator get no structural bonus, so they are only
 * accepted when one of their context keywords appears near the match.
 */
export const PII_DEFINITIONS: PiiTypeDefinition[] = [
  {
    type: 'ssn',
    patterns: [
      /\b\d{3}-\d{2}-\d{4}\b/gi,
      /\b\d{3}\s\d{2}\s\d{4}\b/gi,
      // Bare nine digits; the validator filters most false positives
      /\b\d{9}\b/gi,
    ],
    contextKeywords: ['social security', 'ssn', 'taxpayer id', 'tin'],
    validate: isValidSsn,
    structuralBonus: 0.3,
  },
  {
    type: 'credit_card',
    patterns: [
      // Visa, Mastercard, Amex, Diners, Discover, JCB
      /\b(?:4\d{12}(?:\d{3})?|5[1-5]\d{14}|3[47]\d{13}|3(?:0[0-5]|[68]\d)\d{11}|6(?:011|5\d{2})\d{12}|(?:2131|1800|35\d{3})\d{11})\b/gi,
      // Grouped in fours
      /\b(?:4\d{3}|5[1-5]\d{2}|6(?:011|5\d{2}))(?:[- ]\d{4}){3}\b/gi,
      // Amex 4-6-5
      /\b3[47]\d{2}[- ]\d{6}[- ]\d{5}\b/gi,
    ],
    contextKeywords: ['card number', 'credit card', 'debit card', 'payment'],
    validate: passesLuhn,
    structuralBonus: 0.3,
  },
  {
    type: 'email',
    patterns: [/\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi],
    contextKeywords: [],
    validate: isPlausibleEmail,
    structuralBonus: 0.2,
  },
  {
    type: 'phone',
    patterns: [/(?:\+?1[-.\s]?)?\(?\b\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/gi],
    contextKeywords: ['phone', 'tel', 'mobile', 'cell', 'fax'],
    structuralBonus: 0,
  },
  {
    type: 'account_number',
    patterns: [
      /\baccount\s*(?:number|no\.?)?\s*[#:]?\s*(?<value>\d{8,17})\b/gi,
      /\bacc?t\.?\s*[#:]?\s*(?<value>\d{8,17})\b/gi,
    ],
    contextKeywords: ['account', 'bank', 'routing'],
    structuralBonus: 0,
  },
  {
    type: 'drivers_license',
    patterns: [/\b[A-Z]{1,2}\d{6,8}\b/gi],
    contextKeywords: ['driver', 'license', 'licence'],
    structuralBonus: 0,
  },
  {
    type: 'passport',
    patterns: [/\b[A-Z]{1,2}\d{6,9}\b/gi],
    contextKeywords: ['passport'],
    structuralBonus: 0,
  },
  {
    type: 'date_of_birth',
    patterns: [
      /\b(?:DOB|Date of Birth|Birth Date)[:\s]+(?<value>\d{1,2}[/-]\d{1,2}[/-]\d{2,4})\b/gi,
      /\b\d{1,2}[/-]\d{1,2}[/-]\d{4}\b/gi,
    ],
    contextKeywords: ['date of birth', 'dob', 'birth', 'born'],
    structuralBonus: 0,
  },
]

/**
 * Types whose presence alone makes a document high severity.
 */
export const HIGH_RISK_PII_TYPES: ReadonlySet<PiiType> = new Set([
  'ssn',
  'credit_card',
  'account_number',
  'passport',
])
