/**
 * Source change that starts a pipeline run.
 * Delivered by an external VCS/CI trigger and consumed once.
 */
export interface ChangeEvent {
  /** Unique id of the delivery */
  readonly id: string
  readonly service: string
  readonly commitSha: string
  readonly branch: string
  /** Paths touched by the change, relative to the repository root */
  readonly changedPaths: readonly string[]
  /** Checked-out source tree, when the trigger provides one */
  readonly sourcePath?: string
  readonly receivedAt: string
}
