export interface ResourceRequest {
  cpus: number;
  memoryMb: number | null;
}

interface Waiter {
  request: ResourceRequest;
  grant: () => void;
}

/**
 * Global CPU/memory budget shared by all stage instances. Grants are strictly FIFO so a
 * large request is not starved by a stream of small ones.
 */
export class ResourceBudget {
  private freeCpus: number;
  private freeMemoryMb: number | null;
  private readonly queue: Waiter[] = [];

  constructor(
    readonly maxCpus: number,
    readonly maxMemoryMb: number | null = null
  ) {
    if (!Number.isInteger(maxCpus) || maxCpus < 1) throw new Error(`maxCpus must be an integer >= 1`);
    this.freeCpus = maxCpus;
    this.freeMemoryMb = maxMemoryMb;
  }

  get available(): { cpus: number; memoryMb: number | null } {
    return { cpus: this.freeCpus, memoryMb: this.freeMemoryMb };
  }

  get waiting(): number {
    return this.queue.length;
  }

  private fits(request: ResourceRequest): boolean {
    if (request.cpus > this.freeCpus) return false;
    if (this.freeMemoryMb !== null && request.memoryMb !== null && request.memoryMb > this.freeMemoryMb) return false;
    return true;
  }

  private take(request: ResourceRequest): void {
    this.freeCpus -= request.cpus;
    if (this.freeMemoryMb !== null && request.memoryMb !== null) this.freeMemoryMb -= request.memoryMb;
  }

  private drain(): void {
    while (this.queue.length) {
      const head = this.queue[0];
      if (!head || !this.fits(head.request)) return;
      this.queue.shift();
      this.take(head.request);
      head.grant();
    }
  }

  /** Resolves once the request is granted; the returned function gives the resources back. */
  async acquire(request: ResourceRequest): Promise<() => void> {
    if (request.cpus > this.maxCpus) {
      throw new Error(`request for ${request.cpus} cpus exceeds budget of ${this.maxCpus}`);
    }
    if (this.maxMemoryMb !== null && request.memoryMb !== null && request.memoryMb > this.maxMemoryMb) {
      throw new Error(`request for ${request.memoryMb} MB exceeds budget of ${this.maxMemoryMb} MB`);
    }

    if (!this.queue.length && this.fits(request)) {
      this.take(request);
    } else {
      await new Promise<void>((resolve) => {
        this.queue.push({ request, grant: resolve });
      });
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.freeCpus += request.cpus;
      if (this.freeMemoryMb !== null && request.memoryMb !== null) this.freeMemoryMb += request.memoryMb;
      this.drain();
    };
  }
}
