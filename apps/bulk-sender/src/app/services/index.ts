import {
  createDispatchServices,
  type DispatchServices,
} from "../../domains/dispatch/composition"
import type { AppConfig } from "../config"
import { type CoreServices, createCoreServices } from "./core"
import { createInfraClients, type InfraClients } from "./infra"

export type AppServices = {
  core: CoreServices
  infra: InfraClients
  dispatch: DispatchServices
}

export type ServiceOverrides = {
  core?: Partial<CoreServices>
  infra?: InfraClients
}

export async function createAppServices(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): Promise<AppServices> {
  const core = { ...createCoreServices(config), ...overrides.core }
  const infra = overrides.infra ?? createInfraClients(config)

  const dispatch = await createDispatchServices(config, core, infra)

  return { core, infra, dispatch }
}
