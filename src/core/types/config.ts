/**
 * Scriptcut - Configuration Type Definitions
 */

/** Project-wide settings read from the document header */
export interface ProjectConfig {
  /** Display name of the project */
  readonly projectName: string;
  /** Output width in pixels */
  readonly width: number;
  /** Output height in pixels */
  readonly height: number;
  /** Target frame rate */
  readonly frameRate: number;
  /** Font family for titles and subtitles */
  readonly defaultFont: string;
  /** Font size in points */
  readonly defaultFontSize: number;
  /** Title color as #RRGGBB (upper case) */
  readonly defaultTitleColor: string;
  /** Subtitle color as #RRGGBB (upper case) */
  readonly defaultSubtitleColor: string;
  /** Caption background opacity (0-1) */
  readonly defaultBackgroundAlpha: number;
}
