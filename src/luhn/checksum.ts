// ============================================
// Luhn checksum — pure, no shared state
// ============================================

import { invalidInputError } from "../lib/errors.js";

/**
 * How characters outside '0'-'9' are treated.
 * - passthrough: raw char-code arithmetic, never rejects
 * - strict: throws INVALID_INPUT on the first non-digit
 */
export type CheckMode = "passthrough" | "strict";

const ZERO_CODE = "0".charCodeAt(0);

type DigitReader = (cardNumber: string, index: number) => number;

/** Unchecked: a non-digit yields whatever offset it has from '0'. */
const rawDigit: DigitReader = (cardNumber, index) => cardNumber.charCodeAt(index) - ZERO_CODE;

const checkedDigit: DigitReader = (cardNumber, index) => toDigit(cardNumber.charAt(index), index);

function luhnTotal(cardNumber: string, readDigit: DigitReader): number {
  let total = 0;
  let doubleThisDigit = false;

  for (let i = cardNumber.length - 1; i >= 0; i--) {
    let digit = readDigit(cardNumber, i);

    if (doubleThisDigit) {
      digit *= 2;
      if (digit > 9) {
        digit -= 9;
      }
    }

    total += digit;
    doubleThisDigit = !doubleThisDigit;
  }

  return total;
}

/**
 * Convert a single character to its 0-9 value.
 * Throws INVALID_INPUT for anything else, including multi-character strings.
 * `position` only feeds the error context.
 */
export function toDigit(char: string, position?: number): number {
  if (char.length !== 1) {
    throw invalidInputError("Expected a single character", { position, length: char.length });
  }
  const value = char.charCodeAt(0) - ZERO_CODE;
  if (value < 0 || value > 9) {
    throw invalidInputError("Character is not a decimal digit", { position });
  }
  return value;
}

/**
 * Luhn check with unchecked character conversion.
 *
 * The empty string has a total of 0 and therefore reports valid.
 * Non-digits are not rejected: ":" counts as 10, "a" as 49.
 */
export function isValidLuhn(cardNumber: string): boolean {
  return luhnTotal(cardNumber, rawDigit) % 10 === 0;
}

/** Luhn check that throws INVALID_INPUT on any non-digit character. */
export function isValidLuhnStrict(cardNumber: string): boolean {
  return luhnTotal(cardNumber, checkedDigit) % 10 === 0;
}

export function checkCardNumber(cardNumber: string, mode: CheckMode): boolean {
  return mode === "strict" ? isValidLuhnStrict(cardNumber) : isValidLuhn(cardNumber);
}
