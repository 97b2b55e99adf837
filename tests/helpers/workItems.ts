import { keyForItem } from '../../src/core/batch/CorrelationCodec.js';
import { WorkItem } from '../../src/core/entities/WorkItem.js';

export function makeItems(count: number, processor: string = 'summarize', offset: number = 0): WorkItem[] {
  return Array.from({ length: count }, (_, i) => ({
    namespace: 'docs',
    collection: 'articles',
    itemId: `item-${offset + i}`,
    processor,
    payload: { messages: [{ role: 'user', content: `Summarize article ${offset + i}` }] },
  }));
}

export function keysOf(items: WorkItem[]): string[] {
  return items.map(keyForItem);
}
