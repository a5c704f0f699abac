/**
 * @hopline/shared - code generation, validation, errors and shared types.
 *
 * ```ts
 * import { createCodeGenerator, generateUniqueCode, validateUrl } from "@hopline/shared";
 * ```
 */

export * from "./types/index.js";
export * from "./utils/index.js";
export * from "./constants/index.js";
export * from "./errors/index.js";
