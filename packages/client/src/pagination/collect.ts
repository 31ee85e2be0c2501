// Sequence consumers

import type { Result } from '@ietfdata/protocol';
import type { ListError, ListSequence } from './paginate.js';

/**
 * Drain a sequence into an array, or the error that ended it
 */
export async function collect<T>(sequence: ListSequence<T>): Promise<Result<T[], ListError>> {
  const values: T[] = [];
  for await (const item of sequence) {
    if (!item.success) {
      return item;
    }
    values.push(item.value);
  }
  return { success: true, value: values };
}

/**
 * The first element of a sequence, or null when it is empty.
 * Only the first page is fetched.
 */
export async function first<T>(sequence: ListSequence<T>): Promise<Result<T | null, ListError>> {
  for await (const item of sequence) {
    return item;
  }
  return { success: true, value: null };
}

/**
 * At most `count` elements from the front of a sequence
 */
export async function take<T>(
  sequence: ListSequence<T>,
  count: number
): Promise<Result<T[], ListError>> {
  const values: T[] = [];
  if (count <= 0) {
    await sequence.return();
    return { success: true, value: values };
  }
  for await (const item of sequence) {
    if (!item.success) {
      return item;
    }
    values.push(item.value);
    if (values.length >= count) {
      break;
    }
  }
  return { success: true, value: values };
}
