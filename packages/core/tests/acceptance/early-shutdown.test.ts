import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import type { ReadStream } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { RecordPipeline } from '../../src/RecordPipeline.js';
import { FilePathSource } from '../../src/infrastructure/sources/FilePathSource.js';
import { StreamSource } from '../../src/infrastructure/sources/StreamSource.js';
import type { RecordConverter } from '../../src/domain/ports/RecordConverter.js';
import type { StructuredDocument } from '../../src/domain/model/Document.js';

const opened = vi.hoisted((): ReadStream[] => []);

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return {
    ...actual,
    createReadStream: (...args: Parameters<typeof actual.createReadStream>): ReadStream => {
      const stream = actual.createReadStream(...args);
      opened.push(stream);
      return stream;
    },
  };
});

const TEST_DIR = join(tmpdir(), 'recordflow-test-early-shutdown');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

/** Stream of `lines` records that records whether it was released. */
function trackedStream(lines: number): { source: StreamSource; state: { closed: boolean } } {
  const state = { closed: false };
  async function* generate(): AsyncIterable<string> {
    try {
      for (let i = 0; i < lines; i++) {
        await Promise.resolve();
        yield `line${String(i)}\n`;
      }
    } finally {
      state.closed = true;
    }
  }
  return { source: new StreamSource(generate()), state };
}

/** Fails the record whose text is `poison`. */
function converterFailingOn(poison: string): RecordConverter {
  return {
    format: 'test',
    convert(fields, text): StructuredDocument {
      if (text === poison) throw new Error(`cannot convert ${text}`);
      return [{ name: fields[0] ?? 'value', value: text }];
    },
  };
}

describe('source release on early shutdown', () => {
  it('should release the source after an aborted run', async () => {
    const { source, state } = trackedStream(500);
    const pipeline = new RecordPipeline({
      converter: converterFailingOn('line3'),
      fields: ['value'],
      numDecoders: 2,
      ordered: true,
      conversionErrors: 'abort',
    });
    pipeline.from(source);

    const result = await pipeline.run(() => undefined);

    expect(result.ok).toBe(false);
    expect(state.closed).toBe(true);
    expect(pipeline.getStatus().progress.recordsRead).toBeLessThan(500);
  });

  it('should release the source after the sink throws', async () => {
    const { source, state } = trackedStream(500);
    const pipeline = new RecordPipeline({ converter: converterFailingOn('none'), fields: ['value'], numDecoders: 2 });
    pipeline.from(source);

    const result = await pipeline.run(() => {
      throw new Error('sink down');
    });

    expect(result.ok).toBe(false);
    expect(state.closed).toBe(true);
  });

  it('should release the source when a stream consumer breaks out', async () => {
    const { source, state } = trackedStream(500);
    const pipeline = new RecordPipeline({
      converter: converterFailingOn('none'),
      fields: ['value'],
      numDecoders: 2,
      ordered: true,
    });
    pipeline.from(source);

    for await (const outcome of pipeline.stream()) {
      if (outcome.index === 1) break;
    }

    expect(state.closed).toBe(true);
  });

  it('should destroy the file stream of an aborted FilePathSource run', async () => {
    const filePath = join(TEST_DIR, 'aborted.tsv');
    writeFileSync(filePath, Array.from({ length: 2000 }, (_, i) => `row${String(i)}`).join('\n') + '\n', 'utf-8');

    const pipeline = new RecordPipeline({
      converter: converterFailingOn('row0'),
      fields: ['value'],
      numDecoders: 2,
      ordered: true,
      conversionErrors: 'abort',
    });
    pipeline.from(new FilePathSource(filePath, { highWaterMark: 64 }));

    const result = await pipeline.run(() => undefined);

    const streams = opened.filter((stream) => stream.path === filePath);
    expect(result.ok).toBe(false);
    expect(streams).toHaveLength(1);
    expect(streams[0]?.destroyed).toBe(true);
  });
});
