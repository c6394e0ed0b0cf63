/**
 * IPlanResultLocator
 * ------------------
 * The planner reports success by writing a well-known file (e.g. `sas_plan`)
 * into its working directory. That is process-wide state; this port hides it so
 * each engine (and each test) can point at its own working directory.
 */
export interface IPlanResultLocator {
  /** Directory the planner is started in. */
  readonly workingDirectory: string;

  /**
   * Absolute path of the planner's default output file, or null when absent.
   */
  locate(): Promise<string | null>;

  /**
   * Remove a stale default output file so an earlier run cannot be mistaken
   * for this one. No-op when nothing is there.
   */
  clear(): Promise<void>;
}
