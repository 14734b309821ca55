/**
 * Scriptcut - Scene Type Definitions
 */

/** A run of free-form text inside a scene block */
export interface FreeTextItem {
  text: string;
  /** 1-based line in the source document where the run starts */
  line: number;
}

/** A timestamped chunk of script text */
export interface SceneBlock {
  /** Start of the block in seconds */
  readonly startTime: number;
  /** End of the block in seconds */
  readonly endTime: number;
  /** 1-based line of the separator in the source document */
  readonly line: number;
  /** Content lines joined with newlines and trimmed */
  readonly content: string;
  /** First `# ` line */
  readonly title?: string;
  /** `> ` lines joined with newlines */
  readonly subtitle?: string;
  /** Remaining text runs */
  readonly freeText: readonly FreeTextItem[];
}
