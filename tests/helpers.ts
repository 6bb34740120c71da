import path from 'node:path';
import { loadVocabulary } from '../src/classifier/vocabulary.js';
import type { ZeroShotModel, ZeroShotOutput } from '../src/model/types.js';

export const vocabulary = loadVocabulary(path.resolve('data/vocabulary.json'));

export interface RecordedCall {
  text: string;
  candidateLabels: readonly string[];
}

/**
 * Zero-shot model stand-in. Answers with `respond(text)` and records every call.
 */
export class FakeZeroShotModel implements ZeroShotModel {
  readonly name = 'fake/zero-shot';
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: (text: string) => ZeroShotOutput | Promise<ZeroShotOutput>) {}

  async classify(text: string, candidateLabels: readonly string[]): Promise<ZeroShotOutput> {
    this.calls.push({ text, candidateLabels });
    return this.respond(text);
  }
}

export function ranked(pairs: Array<[string, number]>): ZeroShotOutput {
  return {
    labels: pairs.map(([label]) => label),
    scores: pairs.map(([, score]) => score),
  };
}
