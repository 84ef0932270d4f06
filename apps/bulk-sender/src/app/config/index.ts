export {
  defaultConfigPath,
  type LoadAppConfigOptions,
  loadAppConfig,
  mapToAppConfig,
} from "./load-app-config"
export { type AppConfig, type ConfigProvenance, configSchema, type RawConfig } from "./schema"
