/**
 * Contract validation engine
 *
 * Public entry point for the surrounding operation framework.
 */

export * from "./validation/index.js";

export {
  DEFAULT_CHECKS,
  defaultRegistry,
  INVALID_SPEC_MESSAGE,
  type FuncCheckSpec,
  type TypeName,
} from "./checks/index.js";

export {
  buildErrorV1,
  validationReportToErrorV1,
  toErrorV1,
  getStatusCodeForErrorCode,
  type ErrorCode,
  type ErrorV1,
} from "./utils/errors.js";

export { getConfig, type Config } from "./config/index.js";

export { VERSION } from "./version.js";
