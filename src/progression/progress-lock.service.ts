import { Injectable, Logger } from '@nestjs/common';

/**
 * Single-writer queue per progress key. Transitions on the same key run one
 * after another; different keys never wait on each other.
 */
@Injectable()
export class ProgressLockService {
  private readonly logger = new Logger(ProgressLockService.name);
  private readonly tails = new Map<string, Promise<void>>();

  static planKey(profileId: string, planId: string): string {
    return `plan:${profileId}:${planId}`;
  }

  static cycleKey(cycleId: string): string {
    return `cycle:${cycleId}`;
  }

  /** Guards state shared by all of a profile's cycles. Taken before a cycle key, never inside one. */
  static profileKey(profileId: string): string {
    return `profile:${profileId}`;
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } catch (err) {
      this.logger.debug(`Task on ${key} failed: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
