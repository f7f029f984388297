/**
 * Utilities barrel export
 */

export { logger } from "./logger.js";
export {
  getMaskmailHome,
  getConfigPath,
  getSessionDir,
  getCredentialsPath,
  getLogDir,
  ensureDirectory,
  ensureSecureDirectory,
  initializeDirectories,
} from "./pathResolver.js";
