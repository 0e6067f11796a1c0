/**
 * Bucket arithmetic for the sliding-window counter.
 *
 * A window is approximated by summing fixed-width buckets. The bucket width
 * grows with the window to limit the number of keys a single read touches.
 */

export interface BucketRange {
  /** First bucket id, inclusive */
  start: number;
  /** Last bucket id, inclusive */
  end: number;
}

/**
 * Width of one bucket in seconds for the given window length
 */
export function bucketSize(windowSeconds: number): number {
  if (windowSeconds <= 300) {
    return 1;
  }
  if (windowSeconds <= 3600) {
    return 10;
  }
  if (windowSeconds <= 86400) {
    return 60;
  }
  return 600;
}

export function bucketId(timestampSeconds: number, size: number): number {
  return Math.floor(timestampSeconds / size);
}

export function bucketKey(
  logicalKey: string,
  windowSeconds: number,
  id: number,
): string {
  return `${logicalKey}:w${windowSeconds}:b${id}`;
}

export function bucketRange(
  nowSeconds: number,
  windowSeconds: number,
): BucketRange {
  const size = bucketSize(windowSeconds);
  return {
    start: bucketId(nowSeconds - windowSeconds, size),
    end: bucketId(nowSeconds, size),
  };
}

export function bucketKeysForRange(
  logicalKey: string,
  windowSeconds: number,
  range: BucketRange,
): string[] {
  const keys: string[] = [];
  for (let id = range.start; id <= range.end; id++) {
    keys.push(bucketKey(logicalKey, windowSeconds, id));
  }
  return keys;
}

/**
 * TTL for a freshly created bucket.
 *
 * Never shorter than window + one bucket, so a bucket outlives every window
 * that reads it, and never longer than twice the window regardless of what the
 * caller asks for.
 */
export function bucketTtl(
  windowSeconds: number,
  maxTtlSeconds?: number | null,
): number {
  const ceiling = windowSeconds * 2;
  const requested =
    typeof maxTtlSeconds === 'number' && Number.isFinite(maxTtlSeconds)
      ? maxTtlSeconds
      : ceiling;
  return Math.max(
    windowSeconds + bucketSize(windowSeconds),
    Math.min(requested, ceiling),
  );
}
