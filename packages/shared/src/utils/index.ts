export {
  clampLength,
  encode,
  generateDeterministic,
  generateRandomCode,
  generateWithCollisionHandling,
  createCodeGenerator,
  generateUniqueCode,
  isValidShortCode,
  isValidAliasSyntax,
  isValidShortCodeOrAlias,
} from "./shortcode.js";
export type { GenerationMode, CodeGenerator, CodeGeneratorOptions, ExistsChecker } from "./shortcode.js";

export { sanitizeUrl, validateUrl, validateCustomAlias } from "./url.js";
export type { ValidationResult } from "./url.js";

export { withDeadline } from "./deadline.js";
