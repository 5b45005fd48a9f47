/**
 * Commit object codec
 *
 * Reads and writes the textual commit format produced by `git cat-file commit`:
 * a block of headers (tree, parent*, author, committer, gpgsig or gpgsig-sha256)
 * followed by a blank line and the message. Multi-line header values continue
 * on lines that start with a single space.
 */

import { createHash } from 'crypto';
import type { CommitDetails, CommitIdentity } from './types';
import { GitError } from './errors';

/** Hash of the tree with zero entries in SHA-1 repositories */
export const EMPTY_TREE_SHA1 = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';
/** Hash of the tree with zero entries in SHA-256 repositories */
export const EMPTY_TREE_SHA256 = '6ef19b41225c5369f1c104d45d8d85efa9b057b53b14b4b9b939dd74decc5321';

const IDENTITY_PATTERN = /^(.*) <([^<>]*)> (-?\d+) ([+-]\d{4})$/;

export type CommitObjectFields = Omit<CommitDetails, 'hash'>;

export function formatIdentity(identity: CommitIdentity): string {
  return `${identity.name} <${identity.email}> ${identity.timestamp} ${identity.timezone}`;
}

export function parseIdentity(line: string): CommitIdentity {
  const match = IDENTITY_PATTERN.exec(line);
  if (!match) {
    throw new GitError(`Malformed identity line: ${line}`);
  }
  const [, name = '', email = '', timestamp = '0', timezone = '+0000'] = match;
  return { name, email, timestamp: Number(timestamp), timezone };
}

/**
 * Serializes commit fields into the raw commit format.
 * The signature, when present, is written as a gpgsig header.
 */
export function serializeCommitObject(fields: CommitObjectFields): string {
  const lines: string[] = [`tree ${fields.treeId}`];
  for (const parent of fields.parents) {
    lines.push(`parent ${parent}`);
  }
  lines.push(`author ${formatIdentity(fields.author)}`);
  lines.push(`committer ${formatIdentity(fields.committer)}`);
  if (fields.signature) {
    lines.push(`gpgsig ${fields.signature.split('\n').join('\n ')}`);
  }
  return `${lines.join('\n')}\n\n${fields.message}`;
}

/**
 * Parses raw commit text as printed by `git cat-file commit <hash>`
 */
export function parseCommitObject(hash: string, raw: string): CommitDetails {
  const separator = raw.indexOf('\n\n');
  const headerBlock = separator === -1 ? raw : raw.slice(0, separator);
  const message = separator === -1 ? '' : raw.slice(separator + 2);

  const headers: Array<[string, string]> = [];
  for (const line of headerBlock.split('\n')) {
    const last = headers[headers.length - 1];
    if (line.startsWith(' ') && last) {
      last[1] += `\n${line.slice(1)}`;
      continue;
    }
    const space = line.indexOf(' ');
    if (space === -1) continue;
    headers.push([line.slice(0, space), line.slice(space + 1)]);
  }

  const single = (key: string): string | undefined => headers.find(([k]) => k === key)?.[1];

  const treeId = single('tree');
  const author = single('author');
  const committer = single('committer');
  if (!treeId || !author || !committer) {
    throw new GitError(`Malformed commit object: ${hash}`);
  }

  return {
    hash,
    treeId,
    parents: headers.filter(([k]) => k === 'parent').map(([, v]) => v),
    author: parseIdentity(author),
    committer: parseIdentity(committer),
    message,
    signature: signatureHeader(hash, single),
  };
}

/**
 * SHA-256 repositories sign under `gpgsig-sha256`. A commit converted between
 * object formats can carry both headers, so the one matching the id wins.
 */
function signatureHeader(hash: string, single: (key: string) => string | undefined): string | null {
  const [preferred, fallback] = hash.length === 64 ? ['gpgsig-sha256', 'gpgsig'] : ['gpgsig', 'gpgsig-sha256'];
  return single(preferred) ?? single(fallback) ?? null;
}

/**
 * Object id of a commit in a SHA-1 repository: sha1("commit <size>\0<body>")
 */
export function hashCommitObject(raw: string): string {
  const body = Buffer.from(raw, 'utf-8');
  return createHash('sha1')
    .update(Buffer.concat([Buffer.from(`commit ${body.length}\0`, 'utf-8'), body]))
    .digest('hex');
}
