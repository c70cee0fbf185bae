/**
 * The text of one PDF page together with where it came from.
 */
export interface DocumentPage {
  /** Extracted page text. */
  readonly text: string;
  /** Base name of the originating file (e.g. `report.pdf`). */
  readonly sourceFile: string;
  /** Path the file was read from. */
  readonly sourcePath: string;
  /** 1-based page number within the file. */
  readonly pageNumber: number;
}
