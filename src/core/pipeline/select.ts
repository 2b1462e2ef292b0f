import { minimatch } from 'minimatch'
import type { ChangeEvent } from '../../types/index.js'
import type { ServiceConfig } from '../config/schema.js'

/**
 * Whether any changed path falls under one of the service's patterns
 */
export function matchesService(service: ServiceConfig, changedPaths: readonly string[]): boolean {
  return changedPaths.some(path => service.paths.some(pattern => minimatch(path, pattern, { dot: true })))
}

/**
 * Pick the service pipeline a change applies to.
 * The service named by the change wins when several match.
 */
export function selectService(
  services: readonly ServiceConfig[],
  change: ChangeEvent
): ServiceConfig | undefined {
  const matching = services.filter(service => matchesService(service, change.changedPaths))
  return matching.find(service => service.id === change.service) ?? matching[0]
}
