export class ResourcePoolClosedError extends Error {
  constructor(readonly poolName: string) {
    super(`Resource pool "${poolName}" is closed.`);
    this.name = 'ResourcePoolClosedError';
  }
}

export interface ResourcePoolOptions<T> {
  name: string;
  maxSize: number;
  create(): Promise<T>;
  isUsable(resource: T): boolean;
  destroy(resource: T): Promise<void>;
  onDestroyError(error: unknown): void;
}

interface Waiter<T> {
  resolve(resource: T): void;
  reject(error: unknown): void;
}

/**
 * Lazily grows up to `maxSize` resources. When every resource is borrowed,
 * callers queue in FIFO order. Resources that stop being usable are dropped
 * on return and replaced on demand.
 */
export class ResourcePool<T> {
  private readonly idle: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private size = 0;
  private closed = false;

  constructor(private readonly options: ResourcePoolOptions<T>) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new Error(`Resource pool "${options.name}" needs a positive maxSize.`);
    }
  }

  get stats(): { size: number; idle: number; waiting: number } {
    return { size: this.size, idle: this.idle.length, waiting: this.waiters.length };
  }

  async use<R>(work: (resource: T) => Promise<R>): Promise<R> {
    const resource = await this.acquire();
    try {
      return await work(resource);
    } finally {
      this.release(resource);
    }
  }

  async close(): Promise<void> {
    this.closed = true;

    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter.reject(new ResourcePoolClosedError(this.options.name));
    }

    const idle = this.idle.splice(0);
    this.size -= idle.length;
    await Promise.all(idle.map((resource) => this.discard(resource)));
  }

  private async acquire(): Promise<T> {
    if (this.closed) {
      throw new ResourcePoolClosedError(this.options.name);
    }

    let resource = this.idle.pop();
    while (resource !== undefined) {
      if (this.options.isUsable(resource)) {
        return resource;
      }
      this.size -= 1;
      void this.discard(resource);
      resource = this.idle.pop();
    }

    if (this.size < this.options.maxSize) {
      this.size += 1;
      try {
        return await this.options.create();
      } catch (error) {
        this.size -= 1;
        throw error;
      }
    }

    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private release(resource: T): void {
    if (this.closed || !this.options.isUsable(resource)) {
      this.size -= 1;
      void this.discard(resource);
      this.createForWaiter();
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(resource);
      return;
    }

    this.idle.push(resource);
  }

  private createForWaiter(): void {
    if (this.closed) {
      return;
    }

    const waiter = this.waiters.shift();
    if (!waiter) {
      return;
    }

    this.size += 1;
    void this.options.create().then(waiter.resolve, (error: unknown) => {
      this.size -= 1;
      waiter.reject(error);
    });
  }

  private async discard(resource: T): Promise<void> {
    try {
      await this.options.destroy(resource);
    } catch (error) {
      this.options.onDestroyError(error);
    }
  }
}
