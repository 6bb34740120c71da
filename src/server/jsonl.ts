import { once } from 'node:events';
import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { ClassificationService } from '../classifier/service.js';
import { classifyRequestJson } from './boundary.js';

/**
 * Reads one request per line from `input` and writes one response line to
 * `output`, in order. Blank lines are skipped. Waits for `drain` whenever
 * `output` is full. Resolves when `input` ends.
 */
export async function runJsonLines(
  input: Readable,
  output: Writable,
  service: ClassificationService,
): Promise<number> {
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  let answered = 0;

  for await (const line of lines) {
    if (!line.trim()) continue;
    if (!output.write(`${await classifyRequestJson(line, service)}\n`)) {
      await once(output, 'drain');
    }
    answered++;
  }

  return answered;
}
