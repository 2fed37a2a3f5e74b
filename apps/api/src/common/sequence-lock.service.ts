import { Injectable } from '@nestjs/common';

/**
 * Serialises read-then-write sections (sequence numbers, uniqueness checks)
 * per key within this process. A tenant's records are assumed to have a single
 * API instance writing them; several instances against Firestore would need
 * transactions instead.
 */
@Injectable()
export class SequenceLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
