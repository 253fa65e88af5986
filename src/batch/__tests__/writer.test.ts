/**
 * Tests for the scoped batch writer.
 */

import { NumberAttribute, StringAttribute, VersionAttribute } from '../../attributes/index.js';
import { MapperError } from '../../error/index.js';
import { registerSchema } from '../../schema/index.js';
import { MockTransport } from '../../testing/index.js';
import { BatchExecutor, BatchWriter } from '../index.js';

function counterSchema() {
  return registerSchema({
    tableName: 'Counter',
    attributes: {
      id: new StringAttribute({ hashKey: true }),
      count: new NumberAttribute(),
      version: new VersionAttribute(),
    },
  });
}

interface Counter {
  id: string;
  count: number;
  version?: number;
}

describe('BatchWriter', () => {
  it('should flush automatically when 25 requests are pending', async () => {
    const transport = new MockTransport();
    const writer = new BatchWriter<Counter>(counterSchema(), new BatchExecutor(transport));

    for (let i = 0; i < 26; i++) {
      await writer.save({ id: `c${i}`, count: i });
    }

    expect(transport.callsFor('batchWriteItem')).toHaveLength(1);
    expect(writer.pendingCount).toBe(1);

    await writer.close();
    expect(transport.callsFor('batchWriteItem')).toHaveLength(2);
    expect(writer.pendingCount).toBe(0);
  });

  it('should queue deletes by key and leave versions alone', async () => {
    const transport = new MockTransport();
    const writer = new BatchWriter<Counter>(counterSchema(), new BatchExecutor(transport));

    await writer.save({ id: 'a', count: 1, version: 4 });
    await writer.delete({ id: 'b', count: 0, version: 2 });
    await writer.flush();

    expect(transport.callsFor('batchWriteItem')[0].RequestItems).toEqual({
      Counter: [
        { PutRequest: { Item: { id: { S: 'a' }, count: { N: '1' }, version: { N: '4' } } } },
        { DeleteRequest: { Key: { id: { S: 'b' } } } },
      ],
    });
  });

  it('should reject requests once closed', async () => {
    const writer = new BatchWriter<Counter>(counterSchema(), new BatchExecutor(new MockTransport()));
    await writer.close();

    await expect(writer.save({ id: 'a', count: 1 })).rejects.toBeInstanceOf(MapperError);
    await expect(writer.save({ id: 'a', count: 1 })).rejects.toMatchObject({ code: 'BatchWriterClosed' });
  });
});
