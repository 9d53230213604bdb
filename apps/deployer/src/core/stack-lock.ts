/**
 * Advisory in-process lock keyed by stack name. A deployment holds it from
 * resolution until the pipeline returns or throws.
 */
export class StackLock {
  private readonly held = new Set<string>();

  constructor(private readonly enabled = true) {}

  tryAcquire(stack: string): boolean {
    if (!this.enabled) {
      return true;
    }
    if (this.held.has(stack)) {
      return false;
    }
    this.held.add(stack);
    return true;
  }

  release(stack: string): void {
    this.held.delete(stack);
  }

  isHeld(stack: string): boolean {
    return this.held.has(stack);
  }

  async withLock<T>(stack: string, operation: () => Promise<T>): Promise<{ acquired: true; value: T } | { acquired: false }> {
    if (!this.tryAcquire(stack)) {
      return { acquired: false };
    }

    try {
      return { acquired: true, value: await operation() };
    } finally {
      this.release(stack);
    }
  }
}
