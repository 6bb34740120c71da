import fs from 'node:fs';
import { z } from 'zod';
import type { Vocabulary } from './types.js';

const phraseList = z.array(z.string().min(1)).min(1);

const vocabularyFileSchema = z.object({
  shellCommands: phraseList,
  promptIndicators: phraseList,
  interrogatives: phraseList,
  candidateLabels: phraseList,
  shellLabels: phraseList,
}).refine(
  (v) => v.shellLabels.every(label => v.candidateLabels.includes(label)),
  { message: 'every shell label must also be a candidate label', path: ['shellLabels'] },
);

export type VocabularyFile = z.infer<typeof vocabularyFileSchema>;

/**
 * Builds the frozen lookup form. Matching happens on lower-cased text, so the
 * token lists are lower-cased here; model labels are kept verbatim.
 */
export function buildVocabulary(file: VocabularyFile): Vocabulary {
  const lower = (items: string[]): string[] => items.map(s => s.toLowerCase());
  return Object.freeze({
    shellCommands: new Set(lower(file.shellCommands)),
    promptIndicators: Object.freeze(lower(file.promptIndicators)),
    interrogatives: Object.freeze(lower(file.interrogatives)),
    candidateLabels: Object.freeze([...file.candidateLabels]),
    shellLabels: new Set(file.shellLabels),
  });
}

export function parseVocabulary(raw: unknown): Vocabulary {
  const parsed = vocabularyFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'vocabulary'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid vocabulary: ${details}`);
  }
  return buildVocabulary(parsed.data);
}

export function loadVocabulary(vocabularyPath: string): Vocabulary {
  const raw: unknown = JSON.parse(fs.readFileSync(vocabularyPath, 'utf-8'));
  return parseVocabulary(raw);
}
