/**
 * Config Module
 *
 * Program configuration schema and loading.
 */

export {
  ProgramConfigSchema,
  CONFIG_FILE_NAMES,
  type ProgramConfig,
  type EffectiveConfig,
  type CLIConfigOptions,
  loadProgramConfigFile,
  findProgramConfig,
  getDefaultProgramConfig,
  mergeWithCLIOptions,
} from "./program.js";
