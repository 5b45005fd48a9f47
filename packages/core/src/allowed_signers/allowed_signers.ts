/**
 * Allowed signers - OpenSSH `allowed_signers` file model
 *
 * Each non-comment line is `principals [options] keytype base64 [comment]`,
 * where principals is a comma-separated list and options may contain quoted
 * values with spaces (e.g. `namespaces="git",valid-after="20240101"`).
 *
 * @module allowed_signers
 */

import { parseSshPublicKey } from '../signing_key/ssh_public_key';

export type AllowedSignerEntry = {
  principals: string[];
  options: string | null;
  keyType: string;
  /** Base64 key blob as written in the file */
  publicKey: string;
  comment: string | null;
};

export type UpsertSignerResult = {
  entries: AllowedSignerEntry[];
  /** The entry that was added; null when the principal was already authorized */
  added: AllowedSignerEntry | null;
};

/**
 * Storage for an allowed_signers list.
 */
export interface IAllowedSignersStore {
  getPath(): string;
  exists(): Promise<boolean>;
  /** Entries in file order; [] when the list does not exist */
  read(): Promise<AllowedSignerEntry[]>;
  /** Authorizes email for the key; false when it was already authorized */
  addSigner(email: string, publicKeyLine: string): Promise<boolean>;
}

export class AllowedSignersParseError extends Error {
  constructor(
    message: string,
    public readonly lineNumber: number
  ) {
    super(`allowed_signers line ${lineNumber}: ${message}`);
    this.name = 'AllowedSignersParseError';
    Object.setPrototypeOf(this, AllowedSignersParseError.prototype);
  }
}

const KEY_TYPE_PATTERN = /^(ssh-|ecdsa-|sk-)/;

/**
 * Splits on whitespace outside double quotes.
 */
function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quoted = false;
  for (const char of line) {
    if (char === '"') {
      quoted = !quoted;
      current += char;
    } else if (!quoted && /\s/.test(char)) {
      if (current) tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  if (current) tokens.push(current);
  return tokens;
}

function unquote(value: string): string {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
}

/**
 * Parses allowed signers text, skipping blank lines and `#` comments.
 *
 * @throws AllowedSignersParseError on a line without a key
 */
export function parseAllowedSigners(text: string): AllowedSignerEntry[] {
  const entries: AllowedSignerEntry[] = [];

  text.split('\n').forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) return;

    const [principalsToken, ...rest] = tokenize(line);
    if (!principalsToken) return;

    let options: string | null = null;
    const first = rest[0];
    if (first !== undefined && !KEY_TYPE_PATTERN.test(first)) {
      options = first;
      rest.shift();
    }

    const [keyType, publicKey, ...comment] = rest;
    if (!keyType || !publicKey || !KEY_TYPE_PATTERN.test(keyType)) {
      throw new AllowedSignersParseError('expected "<principals> [options] <keytype> <key>"', index + 1);
    }

    entries.push({
      principals: unquote(principalsToken).split(',').map((p) => p.trim()).filter(Boolean),
      options,
      keyType,
      publicKey,
      comment: comment.length > 0 ? comment.join(' ') : null,
    });
  });

  return entries;
}

export function formatAllowedSignerEntry(entry: AllowedSignerEntry): string {
  const parts = [entry.principals.join(',')];
  if (entry.options) parts.push(entry.options);
  parts.push(entry.keyType, entry.publicKey);
  if (entry.comment) parts.push(entry.comment);
  return parts.join(' ');
}

export function formatAllowedSigners(entries: AllowedSignerEntry[]): string {
  return entries.map((entry) => `${formatAllowedSignerEntry(entry)}\n`).join('');
}

/**
 * Principals authorized for a public key line, in file order.
 */
export function findPrincipalsForKey(entries: AllowedSignerEntry[], publicKeyLine: string): string[] {
  const { keyType, base64 } = parseSshPublicKey(publicKeyLine);
  return entries
    .filter((entry) => entry.keyType === keyType && entry.publicKey === base64)
    .flatMap((entry) => entry.principals);
}

/**
 * Authorizes `email` for a key, appending `<email> <key line>` unless an
 * entry already grants it. Existing entries are never rewritten.
 */
export function upsertSigner(
  entries: AllowedSignerEntry[],
  email: string,
  publicKeyLine: string
): UpsertSignerResult {
  if (findPrincipalsForKey(entries, publicKeyLine).includes(email)) {
    return { entries, added: null };
  }

  const { keyType, base64, comment } = parseSshPublicKey(publicKeyLine);
  const added: AllowedSignerEntry = {
    principals: [email],
    options: null,
    keyType,
    publicKey: base64,
    comment: comment ?? null,
  };
  return { entries: [...entries, added], added };
}
