/**
 * Collapses every whitespace run into a single space and trims the ends.
 * Case is left alone; each heuristic folds case itself.
 */
export function preprocess(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}
