/**
 * Filename Registry
 * Batch-scoped assignment of unique, sanitized output names
 */

import { Mutex } from "./mutex";
import { RegistryError } from "./registry-error";
import { sanitizeFilename } from "./sanitize-filename";

export class FilenameRegistry {
  private mutex = new Mutex();
  private counts = new Map<string, number>(); // sanitized base → names handed out for it
  private reserved = new Set<string>();
  private sealed = false;

  /**
   * Reserve a unique name derived from the proposed one
   * Unseen names are kept as is; repeats get -2, -3, ... until a free name is found
   *
   * @example
   * await registry.assign("User Guide") // "user-guide"
   * await registry.assign("user guide") // "user-guide-2"
   */
  async assign(proposed: string): Promise<string> {
    const base = sanitizeFilename(proposed);

    return this.mutex.runExclusive(() => {
      if (this.sealed) {
        throw new RegistryError(
          `Cannot assign "${base}": filename registry is sealed`,
        );
      }

      let name = base;
      if (this.reserved.has(name)) {
        let suffix = (this.counts.get(base) ?? 1) + 1;
        while (this.reserved.has(`${base}-${suffix}`)) {
          suffix++;
        }
        name = `${base}-${suffix}`;
        this.counts.set(base, suffix);
      } else if (!this.counts.has(base)) {
        this.counts.set(base, 1);
      }

      this.reserved.add(name);
      return name;
    });
  }

  has(name: string): boolean {
    return this.reserved.has(name);
  }

  get size(): number {
    return this.reserved.size;
  }

  /**
   * Stop accepting assignments (called at the phase barrier)
   */
  seal(): void {
    this.sealed = true;
  }
}
