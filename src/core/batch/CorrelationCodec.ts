import { ItemIdentity } from '../entities/WorkItem.js';
import { InvalidWorkItemError, MalformedKeyError } from '../errors.js';

const SEPARATOR = '/';
const SEGMENTS = ['namespace', 'collection', 'itemId', 'processor'] as const;

/**
 * Encode an item identity as `namespace/collection/itemId/processor`.
 * Segments are percent-encoded so the separator never appears inside one.
 */
export function encodeKey(
  namespace: string,
  collection: string,
  itemId: string,
  processor: string
): string {
  const values = [namespace, collection, itemId, processor];
  values.forEach((value, index) => {
    if (value.length === 0) {
      throw new InvalidWorkItemError(`Work item ${SEGMENTS[index]} must not be empty`);
    }
  });
  return values.map((value) => encodeURIComponent(value)).join(SEPARATOR);
}

export function keyForItem(item: ItemIdentity): string {
  return encodeKey(item.namespace, item.collection, item.itemId, item.processor);
}

function decodeSegment(key: string, segment: string): string {
  if (segment.length === 0) {
    throw new MalformedKeyError(key, 'empty segment');
  }
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    throw new MalformedKeyError(key, `invalid escape in "${segment}"`);
  }
  // Only the canonical form produced by encodeKey is accepted
  if (encodeURIComponent(decoded) !== segment) {
    throw new MalformedKeyError(key, `non-canonical segment "${segment}"`);
  }
  return decoded;
}

/**
 * Exact inverse of encodeKey. Throws MalformedKeyError for anything encodeKey cannot produce.
 */
export function decodeKey(key: string): ItemIdentity {
  const parts = key.split(SEPARATOR);
  if (parts.length !== SEGMENTS.length) {
    throw new MalformedKeyError(key, `expected ${SEGMENTS.length} segments, got ${parts.length}`);
  }
  const [namespace, collection, itemId, processor] = parts.map((part) => decodeSegment(key, part));
  return { namespace, collection, itemId, processor };
}
