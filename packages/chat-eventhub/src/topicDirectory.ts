/**
 * Directory of running per-topic handles
 *
 * Owned by the topic router loop; nothing else reads or writes it.
 *
 * Handles:
 * - Lazy creation: a handle is created the first time a topic is needed
 * - Retirement: a handle can be taken out when its worker goes idle
 * - Shutdown: every remaining handle is handed to a cleanup callback
 *
 * ## Usage
 *
 * ```typescript
 * const directory = new TopicDirectory<WorkerHandle>();
 *
 * const handle = directory.getOrCreate(topicId, () => spawnWorker(topic));
 * const retired = directory.take(topicId);
 *
 * await directory.shutdown(async (topicId, handle) => handle.stop());
 * ```
 */
export class TopicDirectory<THandle> {
  private readonly handles = new Map<string, THandle>();

  /**
   * Get an existing handle or create and record a new one
   *
   * @param topicId The topic identifier
   * @param factory Creates the handle when the topic has none yet
   */
  getOrCreate(topicId: string, factory: () => THandle): THandle {
    const existing = this.handles.get(topicId);
    if (existing !== undefined) {
      return existing;
    }

    const created = factory();
    this.handles.set(topicId, created);
    return created;
  }

  has(topicId: string): boolean {
    return this.handles.has(topicId);
  }

  /**
   * Get a handle without creating it
   */
  get(topicId: string): THandle | undefined {
    return this.handles.get(topicId);
  }

  /**
   * Take (remove and return) a handle
   */
  take(topicId: string): THandle | undefined {
    const handle = this.handles.get(topicId);
    this.handles.delete(topicId);
    return handle;
  }

  get size(): number {
    return this.handles.size;
  }

  topicIds(): string[] {
    return Array.from(this.handles.keys());
  }

  async shutdown(cleanup: (topicId: string, handle: THandle) => Promise<void>): Promise<void> {
    const pending = Array.from(this.handles.entries()).map(([topicId, handle]) => cleanup(topicId, handle));
    this.handles.clear();
    await Promise.all(pending);
  }
}
