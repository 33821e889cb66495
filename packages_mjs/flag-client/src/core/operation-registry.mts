/**
 * Table of in-flight operations keyed by operation id.
 *
 * Every method runs to completion synchronously, so the event loop is the
 * serialization point: an entry is added once, appended to while live and
 * removed exactly once by take().
 */

interface PendingEntry<C> {
  context: C;
  chunks: Buffer[];
  bytes: number;
}

export interface CompletedOperation<C> {
  context: C;
  body: Buffer;
}

export class OperationRegistry<C> {
  private readonly pending: Map<number, PendingEntry<C>> = new Map();

  /**
   * Add an operation
   *
   * @throws Error when the id is already live
   */
  register(id: number, context: C): void {
    if (this.pending.has(id)) {
      throw new Error(`Operation ${id} is already registered`);
    }
    this.pending.set(id, { context, chunks: [], bytes: 0 });
  }

  /**
   * Context of a live operation
   */
  get(id: number): C | undefined {
    return this.pending.get(id)?.context;
  }

  /**
   * Append bytes to a live operation. Unknown ids are ignored.
   */
  append(id: number, chunk: Buffer): boolean {
    const entry = this.pending.get(id);
    if (!entry) return false;
    entry.chunks.push(chunk);
    entry.bytes += chunk.length;
    return true;
  }

  /**
   * Remove an operation and return what it accumulated.
   * Returns undefined for ids that are not live.
   */
  take(id: number): CompletedOperation<C> | undefined {
    const entry = this.pending.get(id);
    if (!entry) return undefined;
    this.pending.delete(id);
    return { context: entry.context, body: Buffer.concat(entry.chunks, entry.bytes) };
  }

  has(id: number): boolean {
    return this.pending.has(id);
  }

  get size(): number {
    return this.pending.size;
  }
}
