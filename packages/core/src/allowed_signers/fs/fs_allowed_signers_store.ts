import { promises as fs } from 'fs';
import * as path from 'path';
import type { AllowedSignerEntry, IAllowedSignersStore } from '../allowed_signers';
import { formatAllowedSignerEntry, parseAllowedSigners, upsertSigner } from '../allowed_signers';
import { createLogger } from '../../logger';
import { isFileNotFound } from '../../utils/path_utils';

const logger = createLogger('[AllowedSigners] ');

/**
 * Reads and appends to an allowed_signers file on disk.
 * Appending keeps the user's comments and formatting intact.
 */
export class FsAllowedSignersStore implements IAllowedSignersStore {
  constructor(private readonly filePath: string) {}

  getPath(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * @returns the entries, or [] when the file does not exist
   */
  async read(): Promise<AllowedSignerEntry[]> {
    return parseAllowedSigners(await this.readText());
  }

  async addSigner(email: string, publicKeyLine: string): Promise<boolean> {
    const text = await this.readText();
    const { added } = upsertSigner(parseAllowedSigners(text), email, publicKeyLine);
    if (!added) {
      logger.debug(`${email} already authorized in ${this.filePath}`);
      return false;
    }

    const separator = text === '' || text.endsWith('\n') ? '' : '\n';
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${text}${separator}${formatAllowedSignerEntry(added)}\n`, 'utf-8');
    logger.info(`Added ${email} to ${this.filePath}`);
    return true;
  }

  private async readText(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return '';
      }
      throw error;
    }
  }
}
