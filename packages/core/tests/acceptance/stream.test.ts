import { describe, it, expect } from 'vitest';
import { RecordPipeline } from '../../src/RecordPipeline.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { StreamSource } from '../../src/infrastructure/sources/StreamSource.js';
import { PipelineAggregateError } from '../../src/domain/errors/PipelineErrors.js';
import type { RecordConverter } from '../../src/domain/ports/RecordConverter.js';
import type { StructuredDocument } from '../../src/domain/model/Document.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function upperConverter(): RecordConverter {
  return {
    format: 'test',
    async convert(fields, text, index): Promise<StructuredDocument> {
      await delay(index % 2);
      return [{ name: fields[0] ?? 'value', value: text.toUpperCase() }];
    },
  };
}

function lines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line${String(i)}`).join('\n');
}

describe('stream()', () => {
  it('should yield every outcome in order', async () => {
    const pipeline = new RecordPipeline({
      converter: upperConverter(),
      fields: ['text'],
      numDecoders: 3,
      ordered: true,
    });
    pipeline.from(new BufferSource(lines(12)));

    const indices: number[] = [];
    const values: unknown[] = [];
    for await (const outcome of pipeline.stream()) {
      indices.push(outcome.index);
      if (outcome.ok) values.push(outcome.document[0]?.value);
    }

    expect(indices).toEqual(Array.from({ length: 12 }, (_, i) => i));
    expect(values[11]).toBe('LINE11');
    expect(pipeline.getStatus().status).toBe('COMPLETED');
  });

  it('should throw the aggregate error after a read failure', async () => {
    async function* broken(): AsyncIterable<string> {
      yield 'one\ntwo\n';
      await Promise.resolve();
      throw new Error('disk gone');
    }

    const pipeline = new RecordPipeline({ converter: upperConverter(), fields: ['text'], numDecoders: 2 });
    pipeline.from(new StreamSource(broken()));

    let count = 0;
    const error = await (async () => {
      for await (const _ of pipeline.stream()) {
        count++;
      }
    })().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineAggregateError);
    if (!(error instanceof PipelineAggregateError)) return;
    expect(error.stage).toBe('read');
    expect(error.message).toBe('read stage failed: read error on entry #3: disk gone');
    expect(count).toBeLessThanOrEqual(2);
  });

  it('should stop the pipeline when the consumer breaks out early', async () => {
    const pipeline = new RecordPipeline({
      converter: upperConverter(),
      fields: ['text'],
      numDecoders: 2,
      ordered: true,
    });
    pipeline.from(new BufferSource(lines(50)));

    const taken: number[] = [];
    for await (const outcome of pipeline.stream()) {
      taken.push(outcome.index);
      if (taken.length === 2) break;
    }

    expect(taken).toEqual([0, 1]);
    const status = pipeline.getStatus();
    expect(status.status).toBe('FAILED');
    expect(status.progress.recordsRead).toBeLessThan(50);
  });

  it('should surface a missing source as an iterator error', async () => {
    const pipeline = new RecordPipeline({ converter: upperConverter(), fields: ['text'], numDecoders: 1 });

    await expect(async () => {
      for await (const _ of pipeline.stream()) {
        // never reached
      }
    }).rejects.toThrow('Source must be configured. Call .from(source) first.');
  });
});
