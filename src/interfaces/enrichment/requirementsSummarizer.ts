/**
 * RequirementsSummarizer interface: turns description text into a
 * human-readable requirements summary
 */

export interface RequirementsSummarizer {
  /**
   * Summarize the requirements in a description
   *
   * Returns a sentinel message for empty or unusable input instead of
   * throwing.
   */
  extract(description: string | null | undefined): string;
}
