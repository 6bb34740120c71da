import type { ClassificationMetadata, ClassificationResult, Vocabulary } from './types.js';

export const SHELL_VERB_CONFIDENCE = 0.9;
export const PATTERN_CONFIDENCE = 0.8;
export const AMBIGUOUS_CONFIDENCE = 0.6;

function firstWordOf(lowered: string): string {
  return lowered.split(/\s+/).find(Boolean) ?? '';
}

/**
 * Deterministic pattern-based classification.
 *
 * A known command as the first word wins outright. Otherwise flag and path
 * patterns point to a shell command unless any natural-language indicator is
 * present, in which case the input is a prompt. Inputs with no signal at all
 * default to prompt at reduced confidence.
 */
export function classifyHeuristic(text: string, vocabulary: Vocabulary): ClassificationResult {
  const lowered = text.toLowerCase().trim();
  const firstWord = firstWordOf(lowered);

  if (vocabulary.shellCommands.has(firstWord)) {
    return {
      classification: 'shell',
      confidence: SHELL_VERB_CONFIDENCE,
      reasoning: `Detected shell command pattern with first word '${firstWord}'`,
      metadata: { detected_patterns: ['command_verb'], language_indicators: [] },
    };
  }

  const detectedPatterns: string[] = [];
  const languageIndicators: string[] = [];

  // Leading space keeps hyphenated words from counting as flags
  if (text.includes(' -') || text.includes(' --')) {
    detectedPatterns.push('flag_pattern');
  }

  if (text.includes('./') || text.includes('../') || firstWord.includes('/')) {
    detectedPatterns.push('path_pattern');
  }

  for (const indicator of vocabulary.promptIndicators) {
    if (lowered.includes(indicator)) {
      languageIndicators.push(indicator);
    }
  }

  if (text.endsWith('?') || vocabulary.interrogatives.some(q => lowered.startsWith(q))) {
    languageIndicators.push('question_pattern');
  }

  const metadata: ClassificationMetadata = {
    detected_patterns: detectedPatterns,
    language_indicators: languageIndicators,
  };

  if (detectedPatterns.length > 0 && languageIndicators.length === 0) {
    return {
      classification: 'shell',
      confidence: PATTERN_CONFIDENCE,
      reasoning: `Detected shell patterns: ${detectedPatterns.join(', ')}`,
      metadata,
    };
  }

  if (languageIndicators.length > 0) {
    return {
      classification: 'prompt',
      confidence: PATTERN_CONFIDENCE,
      reasoning: `Detected natural language indicators: ${languageIndicators.join(', ')}`,
      metadata,
    };
  }

  return {
    classification: 'prompt',
    confidence: AMBIGUOUS_CONFIDENCE,
    reasoning: 'Ambiguous input, defaulting to prompt classification',
    metadata,
  };
}
