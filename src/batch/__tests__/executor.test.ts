/**
 * Tests for batch execution.
 */

import type { WriteRequest } from '@aws-sdk/client-dynamodb';

import type { WireItem } from '../../codec/index.js';
import { BatchIncompleteError } from '../../error/index.js';
import { InMemoryMetricsCollector, MapperMetricNames } from '../../observability/index.js';
import { MockTransport } from '../../testing/index.js';
import { BatchExecutor, calculateBackoff, chunk, chunkBySize } from '../index.js';

function putRequests(count: number): WriteRequest[] {
  return Array.from({ length: count }, (_, i) => ({ PutRequest: { Item: { id: { S: `i${i}` } } } }));
}

function keys(count: number): WireItem[] {
  return Array.from({ length: count }, (_, i) => ({ id: { S: `k${i}` } }));
}

function recordingSleep(delays: number[]) {
  return async (ms: number): Promise<void> => {
    delays.push(ms);
  };
}

describe('chunk', () => {
  it('should split arrays into fixed-size chunks', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 2)).toEqual([]);
  });

  it('should reject a non-positive size', () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
  });
});

describe('chunkBySize', () => {
  it('should bound chunks by count and by size', () => {
    expect(chunkBySize(['aaaa', 'bb', 'cccc'], 10, 6, (s) => s.length)).toEqual([['aaaa', 'bb'], ['cccc']]);
    expect(chunkBySize(['a', 'b', 'c'], 2, 100, (s) => s.length)).toEqual([['a', 'b'], ['c']]);
  });

  it('should keep an oversized entry in a chunk of its own', () => {
    expect(chunkBySize(['a', 'bbbbbbbb', 'c'], 10, 4, (s) => s.length)).toEqual([['a'], ['bbbbbbbb'], ['c']]);
  });
});

describe('calculateBackoff', () => {
  it('should double from the base delay up to the cap', () => {
    const config = { maxRetries: 5, baseDelayMs: 100, maxDelayMs: 300 };
    expect([1, 2, 3, 4].map((n) => calculateBackoff(n, config))).toEqual([100, 200, 300, 300]);
  });
});

describe('BatchExecutor', () => {
  describe('writeAll', () => {
    it('should resubmit unprocessed requests until every chunk is written', async () => {
      const transport = new MockTransport();
      transport.on('batchWriteItem', (input, callIndex) => ({
        $metadata: {},
        UnprocessedItems: { T: callIndex < 2 ? (input.RequestItems?.T ?? []).slice(0, 5) : [] },
      }));
      const delays: number[] = [];
      const executor = new BatchExecutor(transport, { sleep: recordingSleep(delays) });

      await executor.writeAll('T', putRequests(30));

      const calls = transport.callsFor('batchWriteItem');
      expect(calls.map((call) => call.RequestItems?.T?.length)).toEqual([25, 5, 5, 5]);
      expect(delays).toEqual([100, 200]);
    });

    it('should give up after the retry ceiling and report what is left', async () => {
      const transport = new MockTransport();
      transport.on('batchWriteItem', (input) => ({
        $metadata: {},
        UnprocessedItems: { T: (input.RequestItems?.T ?? []).slice(0, 1) },
      }));
      const executor = new BatchExecutor(transport, {
        retry: { maxRetries: 2, baseDelayMs: 0 },
        sleep: recordingSleep([]),
      });

      const error = await executor.writeAll('T', putRequests(26)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BatchIncompleteError);
      expect(transport.callsFor('batchWriteItem')).toHaveLength(3);
      if (error instanceof BatchIncompleteError) {
        expect(error.unprocessed).toEqual([{ PutRequest: { Item: { id: { S: 'i0' } } } }]);
        expect(error.notAttempted).toEqual([{ PutRequest: { Item: { id: { S: 'i25' } } } }]);
        expect(error.message).toBe(
          'BatchWriteItem: 1 entries still unprocessed after 3 attempts, 1 entries not attempted'
        );
      }
    });

    it('should make no request for an empty batch', async () => {
      const transport = new MockTransport();
      await new BatchExecutor(transport).writeAll('T', []);
      expect(transport.callsFor('batchWriteItem')).toHaveLength(0);
    });
  });

  describe('getAll', () => {
    it('should yield every document and resubmit unprocessed keys', async () => {
      const all = keys(150);
      const transport = new MockTransport();
      transport.on('batchGetItem', (input, callIndex) => {
        const requested = input.RequestItems?.T?.Keys ?? [];
        if (callIndex === 0) {
          return {
            $metadata: {},
            Responses: { T: requested.slice(0, 90) },
            UnprocessedKeys: { T: { Keys: requested.slice(90) } },
          };
        }
        return { $metadata: {}, Responses: { T: requested } };
      });
      const metrics = new InMemoryMetricsCollector();
      const executor = new BatchExecutor(transport, { metrics, sleep: recordingSleep([]) });

      const documents: WireItem[] = [];
      for await (const document of executor.getAll('T', all)) {
        documents.push(document);
      }

      expect(documents).toEqual(all);
      expect(transport.callsFor('batchGetItem').map((call) => call.RequestItems?.T?.Keys?.length)).toEqual([
        100, 10, 50,
      ]);
      expect(
        metrics.getCounter(MapperMetricNames.BATCH_UNPROCESSED, { operation: 'BatchGetItem', table: 'T' })
      ).toBe(10);
      expect(metrics.getCounter(MapperMetricNames.ITEMS_RETURNED, { operation: 'BatchGetItem', table: 'T' })).toBe(
        150
      );
    });

    it('should request a projection of the named attributes', async () => {
      const transport = new MockTransport();
      const executor = new BatchExecutor(transport);

      for await (const document of executor.getAll('T', keys(1), { attributesToGet: ['id', 'name'] })) {
        expect(document).toBeDefined();
      }

      expect(transport.callsFor('batchGetItem')[0].RequestItems?.T).toEqual({
        Keys: [{ id: { S: 'k0' } }],
        ProjectionExpression: '#p0, #p1',
        ExpressionAttributeNames: { '#p0': 'id', '#p1': 'name' },
      });
    });

    it('should throw with the keys still unprocessed after the last retry', async () => {
      const transport = new MockTransport();
      transport.on('batchGetItem', (input) => ({
        $metadata: {},
        Responses: { T: [] },
        UnprocessedKeys: { T: { Keys: input.RequestItems?.T?.Keys ?? [] } },
      }));
      const executor = new BatchExecutor(transport, { retry: { maxRetries: 1 }, sleep: recordingSleep([]) });

      const consume = async (): Promise<void> => {
        for await (const document of executor.getAll('T', keys(2))) {
          expect(document).toBeDefined();
        }
      };

      await expect(consume()).rejects.toThrow('BatchGetItem: 2 entries still unprocessed after 2 attempts');
      expect(transport.callsFor('batchGetItem')).toHaveLength(2);
    });
  });
});
