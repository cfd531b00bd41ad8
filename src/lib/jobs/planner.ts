import type { ChunkDescriptor, ChunkPlan } from './model';

function assertCount(name: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * Splits `totalRows` rows into `ceil(totalRows / chunkSize)` ordered chunks
 * with half-open row ranges. The last chunk may be short; no chunk is empty.
 */
export function planChunks(totalRows: number, chunkSize: number): ChunkPlan {
  assertCount('totalRows', totalRows, 0);
  assertCount('chunkSize', chunkSize, 1);

  const totalChunks = Math.ceil(totalRows / chunkSize);
  const chunks: ChunkDescriptor[] = Array.from({ length: totalChunks }, (_value, index) => ({
    chunkIndex: index + 1,
    rowRange: {
      start: index * chunkSize,
      end: Math.min((index + 1) * chunkSize, totalRows),
    },
  }));

  return {
    totalRows,
    chunkSize,
    totalChunks,
    unchunked: totalChunks === 1,
    chunks,
  };
}

/**
 * Plans by a requested number of chunks. Rows per chunk is rounded up, so the
 * plan can hold fewer chunks than requested (10 rows in 4 chunks gives 3,3,3,1;
 * 10 rows in 6 chunks gives five chunks of 2).
 */
export function planByChunkCount(totalRows: number, chunkCount: number): ChunkPlan {
  assertCount('chunkCount', chunkCount, 1);
  return planChunks(totalRows, Math.max(1, Math.ceil(totalRows / chunkCount)));
}
