// ---------------------------------------------------------------------------
// Shared packaging domain types.
//
// Configuration and manifest shapes are inferred from their zod schemas so
// that validation and typing never drift apart.
// ---------------------------------------------------------------------------

import type {z} from 'zod'
import type {
  dockerConfigSchema,
  manifestConfigSchema,
  manifestSchema,
  packagingConfigSchema
} from './core/schemas.js'

// -- Configuration ----------------------------------------------------------

/** Build and runtime parameters of the packaged image (`docker` section). */
export type DockerConfig = z.infer<typeof dockerConfigSchema>

/** Descriptive block metadata (`manifest` section). */
export type ManifestConfig = z.infer<typeof manifestConfigSchema>

/** A configuration file whose two sections have both been validated. */
export type PackagingConfig = z.infer<typeof packagingConfigSchema>

export type AlgorithmType = DockerConfig['input']['type']

// -- Manifest ---------------------------------------------------------------

/** The platform manifest persisted as `UP42Manifest.json`. */
export type Manifest = z.infer<typeof manifestSchema>

// -- Image introspection ----------------------------------------------------

export const distributions = ['debian', 'ubuntu', 'centos', 'fedora'] as const

/** Linux distribution family of a base image, read from `/etc/os-release`. */
export type Distribution = typeof distributions[number]

/** Dockerfile template flavour; several distributions share one. */
export type DockerfileVariant = 'debian' | 'centos'

/**
 * Lifecycle of one layer during a pull, in the order the image store reports
 * it. A layer only ever moves forward through this list.
 */
export const layerProgressStates = [
  'pulling',
  'waiting',
  'downloading',
  'verifying',
  'download_completed',
  'extracting',
  'pull_completed'
] as const

export type LayerProgressState = typeof layerProgressStates[number]

export function isDistribution(value: string): value is Distribution {
  return distributions.some(distribution => distribution === value)
}
