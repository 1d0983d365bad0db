export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext, LogData } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { toKebab, toWords } from "./utils/case.js";
