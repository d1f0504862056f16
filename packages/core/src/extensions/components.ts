import type { ComponentDirectory } from './types.js';

/** Ordered list of the host's active components. */
export class ActiveComponentDirectory implements ComponentDirectory {
  private readonly names: string[] = [];

  constructor(initial: readonly string[] = []) {
    for (const name of initial) this.add(name);
  }

  add(name: string): void {
    if (!this.names.includes(name)) {
      this.names.push(name);
    }
  }

  remove(name: string): void {
    const index = this.names.indexOf(name);
    if (index !== -1) {
      this.names.splice(index, 1);
    }
  }

  has(name: string): boolean {
    return this.names.includes(name);
  }

  list(): string[] {
    return [...this.names];
  }
}
