/**
 * Strip everything that is not a digit.
 */
function digitsOf(value: string): string {
  return value.replace(/\D/g, '')
}

/**
 * SSN structure: exactly nine digits, not all zeros or ones,
 * and not one of the reserved area numbers 000 and 666.
 */
export function isValidSsn(value: string): boolean {
  const digits = digitsOf(value)

  if (digits.length !== 9) return false
  if (digits === '000000000' || digits === '111111111') return false

  const area = digits.slice(0, 3)
  if (area === '000' || area === '666') return false

  return true
}

/**
 * Luhn checksum over the digits of a card number.
 */
export function passesLuhn(value: string): boolean {
  const digits = digitsOf(value)
  if (digits.length === 0) return false

  let checksum = 0
  for (let i = 0; i < digits.length; i++) {
    // Walk from the rightmost digit; every second one is doubled
    let digit = Number(digits[digits.length - 1 - i])
    if (i % 2 === 1) {
      digit *= 2
      if (digit > 9) digit -= 9
    }
    checksum += digit
  }

  return checksum % 10 === 0
}

/**
 * Email structure: an '@' followed by a domain containing a '.'.
 */
export function isPlausibleEmail(value: string): boolean {
  const at = value.indexOf('@')
  if (at <= 0) return false
  const domain = value.slice(at + 1)
  return domain.includes('.') && !domain.startsWith('.') && !domain.endsWith('.')
}
