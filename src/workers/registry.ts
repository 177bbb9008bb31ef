import { RegistryLockedError, UnknownCapabilityError, ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { Worker } from "./worker.js";

export type WorkerHealth = {
  capability: string;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

/** Capability name → worker. Frozen while any run holds a lock. */
export class WorkerRegistry {
  private workers = new Map<string, Worker>();
  private healthCache = new Map<string, WorkerHealth>();
  private locks = 0;

  register(capability: string, worker: Worker): void {
    this.assertUnlocked(capability);
    if (this.workers.has(capability)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Capability "${capability}" already registered`);
    }
    this.workers.set(capability, worker);
  }

  unregister(capability: string): boolean {
    this.assertUnlocked(capability);
    this.healthCache.delete(capability);
    return this.workers.delete(capability);
  }

  resolve(capability: string): Worker {
    const worker = this.workers.get(capability);
    if (!worker) throw new UnknownCapabilityError(capability);
    return worker;
  }

  has(capability: string): boolean {
    return this.workers.has(capability);
  }

  capabilities(): string[] {
    return [...this.workers.keys()];
  }

  get locked(): boolean {
    return this.locks > 0;
  }

  /** Freeze registrations until the returned release function is called. */
  lock(): () => void {
    this.locks++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.locks--;
    };
  }

  private assertUnlocked(capability: string): void {
    if (this.locked) throw new RegistryLockedError(capability);
  }

  /** Check health of the worker behind a capability. */
  async checkHealth(capability: string): Promise<WorkerHealth> {
    const worker = this.workers.get(capability);
    if (!worker) {
      return { capability, healthy: false, lastCheck: Date.now(), error: "Worker not found" };
    }

    const start = Date.now();
    let result: WorkerHealth;
    try {
      // No health check method - assume healthy
      const healthy = worker.healthCheck ? await worker.healthCheck() : true;
      result = { capability, healthy, lastCheck: Date.now(), responseTimeMs: Date.now() - start };
    } catch (err) {
      result = {
        capability,
        healthy: false,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
        error: String(err),
      };
      log.warn(`Health check failed for "${capability}"`, { error: String(err) });
    }
    this.healthCache.set(capability, result);
    return result;
  }

  async checkAllHealth(): Promise<WorkerHealth[]> {
    return Promise.all(this.capabilities().map((c) => this.checkHealth(c)));
  }

  /** Last recorded health, without probing. */
  getCachedHealth(capability: string): WorkerHealth | undefined {
    return this.healthCache.get(capability);
  }
}
