import { describe, it, expect } from 'vitest';
import { Readable, Writable } from 'node:stream';
import { runJsonLines } from '../../../src/server/jsonl.js';
import { ClassificationService } from '../../../src/classifier/service.js';
import { vocabulary } from '../../helpers.js';

function collector(): { stream: Writable; lines: () => string[] } {
  let text = '';
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      text += chunk.toString('utf-8');
      callback();
    },
  });
  return { stream, lines: () => text.split('\n').filter(Boolean) };
}

describe('runJsonLines', () => {
  it('answers each non-blank line in order', async () => {
    const input = Readable.from([Buffer.from('{"input":"pwd"}\n\n{"input":"what is a symlink"}\nnot json\n')]);
    const out = collector();
    const service = new ClassificationService({ vocabulary });

    const answered = await runJsonLines(input, out.stream, service);

    expect(answered).toBe(3);
    const responses: Array<{ classification: string; confidence: number }> = out.lines().map(line => JSON.parse(line));
    expect(responses.map(r => [r.classification, r.confidence])).toEqual([
      ['shell', 0.9],
      ['prompt', 0.8],
      ['prompt', 0.5],
    ]);
  });

  it('handles input without a trailing newline', async () => {
    const input = Readable.from([Buffer.from('{"input":""}')]);
    const out = collector();

    await runJsonLines(input, out.stream, new ClassificationService({ vocabulary }));

    expect(out.lines().map(line => JSON.parse(line))).toEqual([{
      classification: 'shell',
      confidence: 1,
      reasoning: 'Empty input defaults to shell',
      metadata: { detected_patterns: [], language_indicators: [] },
    }]);
  });

  it('waits for a full output to drain before writing the next response', async () => {
    const input = Readable.from([Buffer.from('{"input":"ls"}\n{"input":"pwd"}\n{"input":"what is a symlink"}\n')]);
    const written: string[] = [];
    const backlog: number[] = [];
    const output = new Writable({
      highWaterMark: 1,
      write(chunk: Buffer, _encoding, callback) {
        backlog.push(this.writableLength - chunk.length);
        written.push(chunk.toString('utf-8'));
        setTimeout(callback, 5);
      },
    });

    const answered = await runJsonLines(input, output, new ClassificationService({ vocabulary }));

    expect(answered).toBe(3);
    expect(backlog).toEqual([0, 0, 0]);
    const responses: Array<{ classification: string }> = written.map(line => JSON.parse(line));
    expect(responses.map(r => r.classification)).toEqual(['shell', 'shell', 'prompt']);
  });
});
