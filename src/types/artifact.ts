/**
 * Immutable, content-addressed deployable build output
 */
export interface Artifact {
  readonly serviceId: string
  /** Content digest assigned by the registry (e.g. sha256:...) */
  readonly digest: string
  readonly versionTag: string
  readonly commitSha: string
  readonly builtAt: string
}

/**
 * Lifecycle of a built artifact.
 * A quarantined artifact is kept for inspection and never deployed.
 */
export type ArtifactStatus = 'built' | 'deployable' | 'quarantined'
