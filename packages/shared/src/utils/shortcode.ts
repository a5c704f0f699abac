/**
 * Short code generation
 *
 * Codes are fixed-length base62 strings. Three generation modes exist:
 *
 * - deterministic:   encode(sha256(url)), so the same URL always maps to the same code
 * - random:          cryptographically random symbols
 * - collision-retry: deterministic first, then salted re-hashes, then random
 *
 * The mode is picked once when a generator is built. Existence checks belong
 * to the caller; generateUniqueCode walks the attempts until one is free.
 */

import { createHash, randomInt } from "node:crypto";
import { SHORTCODE_CONFIG } from "../constants/index.js";
import { internalError } from "../errors/index.js";

// =============================================================================
// TYPES
// =============================================================================

export type GenerationMode = "deterministic" | "random" | "collision-retry";

export interface CodeGeneratorOptions {
  mode?: GenerationMode;
  length?: number;
}

export interface CodeGenerator {
  readonly mode: GenerationMode;
  readonly length: number;
  /** Produce the candidate for the given attempt number (0-based) */
  generate(url: string, attempt?: number): string;
}

/** Resolves true when the code is already taken */
export type ExistsChecker = (code: string) => Promise<boolean>;

// =============================================================================
// ENCODING
// =============================================================================

const BASE = BigInt(SHORTCODE_CONFIG.ALPHABET.length);
const ZERO_SYMBOL = SHORTCODE_CONFIG.ALPHABET[0];

/**
 * Lengths outside [MIN_LENGTH, MAX_LENGTH] fall back to the default instead of failing.
 */
export function clampLength(length: number | undefined): number {
  const { MIN_LENGTH, MAX_LENGTH, DEFAULT_LENGTH } = SHORTCODE_CONFIG;
  if (length === undefined || !Number.isInteger(length) || length < MIN_LENGTH || length > MAX_LENGTH) {
    return DEFAULT_LENGTH;
  }
  return length;
}

/**
 * Map a byte string onto exactly `length` base62 symbols.
 *
 * The bytes are read as one big-endian unsigned integer. Digits are produced
 * least significant first and only the lowest `length` of them are kept, so
 * long inputs are truncated and short ones are left-padded with "0".
 *
 * @example
 * ```ts
 * encode(new Uint8Array(), 7)          // "0000000"
 * encode(Uint8Array.of(255, 255), 4)   // "0h31"
 * ```
 */
export function encode(bytes: Uint8Array, length: number): string {
  const size = clampLength(length);

  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }

  const digits: string[] = [];
  while (value > 0n && digits.length < size) {
    digits.push(SHORTCODE_CONFIG.ALPHABET[Number(value % BASE)]);
    value /= BASE;
  }
  while (digits.length < size) {
    digits.push(ZERO_SYMBOL);
  }

  return digits.reverse().join("");
}

function sha256(input: string): Uint8Array {
  return createHash("sha256").update(input).digest();
}

// =============================================================================
// GENERATION
// =============================================================================

export function generateDeterministic(url: string, length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH): string {
  return encode(sha256(url), length);
}

export function generateRandomCode(length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH): string {
  const size = clampLength(length);
  const { ALPHABET } = SHORTCODE_CONFIG;

  let code = "";
  for (let i = 0; i < size; i++) {
    code += ALPHABET[randomInt(ALPHABET.length)];
  }
  return code;
}

/**
 * Candidate for a given attempt: 0 is the plain hash, 1..4 hash
 * `url + ":attempt:" + n`, anything later is random.
 */
export function generateWithCollisionHandling(
  url: string,
  attempt: number,
  length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH
): string {
  if (attempt <= 0) {
    return generateDeterministic(url, length);
  }
  if (attempt <= SHORTCODE_CONFIG.SALTED_ATTEMPTS) {
    return encode(sha256(`${url}:attempt:${attempt}`), length);
  }
  return generateRandomCode(length);
}

export function createCodeGenerator(options: CodeGeneratorOptions = {}): CodeGenerator {
  const mode = options.mode ?? "collision-retry";
  const length = clampLength(options.length);

  switch (mode) {
    case "deterministic":
      return { mode, length, generate: (url) => generateDeterministic(url, length) };
    case "random":
      return { mode, length, generate: () => generateRandomCode(length) };
    case "collision-retry":
      return {
        mode,
        length,
        generate: (url, attempt = 0) => generateWithCollisionHandling(url, attempt, length),
      };
  }
}

/**
 * Walk generator attempts until `exists` reports a free code.
 *
 * @throws AppError(INTERNAL_ERROR) once MAX_ATTEMPTS candidates were all taken
 */
export async function generateUniqueCode(
  url: string,
  exists: ExistsChecker,
  generator: CodeGenerator = createCodeGenerator(),
  maxAttempts: number = SHORTCODE_CONFIG.MAX_ATTEMPTS
): Promise<string> {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const code = generator.generate(url, attempt);
    if (!(await exists(code))) {
      return code;
    }
  }

  throw internalError(`Failed to generate a unique short code after ${maxAttempts} attempts`);
}

// =============================================================================
// VALIDATION
// =============================================================================

export function isValidShortCode(code: string): boolean {
  const { MIN_LENGTH, MAX_LENGTH, ALPHABET } = SHORTCODE_CONFIG;
  if (code.length < MIN_LENGTH || code.length > MAX_LENGTH) {
    return false;
  }
  for (const char of code) {
    if (!ALPHABET.includes(char)) {
      return false;
    }
  }
  return true;
}

export function isValidAliasSyntax(alias: string): boolean {
  const { MIN_LENGTH, MAX_LENGTH, PATTERN } = SHORTCODE_CONFIG.CUSTOM_ALIAS;
  return alias.length >= MIN_LENGTH && alias.length <= MAX_LENGTH && PATTERN.test(alias);
}

/**
 * Accepts anything that could address a record: a generated code or a custom alias.
 */
export function isValidShortCodeOrAlias(code: string): boolean {
  return isValidShortCode(code) || isValidAliasSyntax(code);
}
