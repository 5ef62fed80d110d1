export { ensureDir, deepMerge, readSettings, settingsFile, legacySettingsFile } from "./settings.js";
export { loadConfig, resolveOptimizeOptions, type AppConfig } from "./env.js";
