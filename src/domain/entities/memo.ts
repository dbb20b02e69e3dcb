/**
 * A non-actionable note or idea extracted from user input.
 */
export interface Memo {
  content: string;
}
