import { randomUUID } from 'node:crypto';

import type { SecretStore } from '../backends/types.js';

interface StoredSecret {
  ref: string;
  content: Readonly<Record<string, string>>;
}

/**
 * Process-local secret store.
 *
 * References look like `secret:<uuid>`; a new reference is issued every time
 * a name is written. Content is lost on restart.
 */
export class MemorySecretStore implements SecretStore {
  private readonly secrets = new Map<string, StoredSecret>();

  async put(name: string, content: Readonly<Record<string, string>>): Promise<string> {
    const ref = `secret:${randomUUID()}`;
    this.secrets.set(name, { ref, content: { ...content } });
    return ref;
  }

  /** Removing an unknown name is a no-op */
  async remove(name: string): Promise<void> {
    this.secrets.delete(name);
  }

  /** Content stored under a reference, or null */
  resolve(ref: string): Readonly<Record<string, string>> | null {
    for (const secret of this.secrets.values()) {
      if (secret.ref === ref) return secret.content;
    }
    return null;
  }

  has(name: string): boolean {
    return this.secrets.has(name);
  }
}
