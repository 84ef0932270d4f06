import { type AppConfig, type LoadAppConfigOptions, loadAppConfig } from "./config"
import { type AppServices, createAppServices, type ServiceOverrides } from "./services"

export type AppContextOptions = LoadAppConfigOptions & {
  overrides?: ServiceOverrides
}

export type AppContext = {
  config: AppConfig
  services: AppServices
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const { overrides, ...configOptions } = options

  const config = await loadAppConfig(configOptions)
  const services = await createAppServices(config, overrides)

  services.core.logger.info("configuration loaded", {
    sources: config.provenance.sources,
    credentials: config.provenance.credentials,
  })

  return { config, services }
}
