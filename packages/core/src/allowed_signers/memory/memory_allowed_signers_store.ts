import type { AllowedSignerEntry, IAllowedSignersStore } from '../allowed_signers';
import { upsertSigner } from '../allowed_signers';

/**
 * In-memory allowed signers list for tests.
 */
export class MemoryAllowedSignersStore implements IAllowedSignersStore {
  private entries: AllowedSignerEntry[] | null;

  constructor(
    private readonly filePath: string = '/memory/allowed_signers',
    entries?: AllowedSignerEntry[]
  ) {
    this.entries = entries ? [...entries] : null;
  }

  getPath(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    return this.entries !== null;
  }

  async read(): Promise<AllowedSignerEntry[]> {
    return [...(this.entries ?? [])];
  }

  async addSigner(email: string, publicKeyLine: string): Promise<boolean> {
    const { entries, added } = upsertSigner(this.entries ?? [], email, publicKeyLine);
    this.entries = entries;
    return added !== null;
  }
}
