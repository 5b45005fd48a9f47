/**
 * InceptionCommitCreator Tests
 *
 * Runs against the in-memory git module with real Ed25519 signatures.
 */

import { InceptionCommitCreator } from './inception_creator';
import { INCEPTION_BODY, INCEPTION_SUMMARY } from './inception_message';
import { MemoryGitModule } from '../git/memory';
import { EMPTY_TREE_SHA1, GitCommandError } from '../git';
import { MemorySigningKeyProvider } from '../signing_key/memory';
import type { SigningKey } from '../signing_key';
import { RepositoryError, SigningError, UsageError } from '../errors';

const ALICE = { name: 'Alice', email: 'alice@example.com' };

describe('InceptionCommitCreator', () => {
  let keys: MemorySigningKeyProvider;
  let git: MemoryGitModule;
  let creator: InceptionCommitCreator;
  let key: SigningKey;

  beforeEach(() => {
    keys = new MemorySigningKeyProvider();
    git = new MemoryGitModule({ signer: keys });
    creator = new InceptionCommitCreator({ git });
    key = keys.generateSigningKeySync(ALICE.email);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Commit shape (EARS-IC1 to IC5)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('Commit shape (EARS-IC1 to IC5)', () => {
    it('[EARS-IC1] should create an empty, parentless, signed commit', async () => {
      const commit = await creator.createInceptionCommit(key, ALICE);

      expect(commit.treeId).toBe(EMPTY_TREE_SHA1);
      expect(commit.parents).toEqual([]);
      expect(commit.signature).toContain('BEGIN MEMORY SIGNATURE');
      expect(await git.getRootCommits()).toEqual([commit.commitId]);
    });

    it('[EARS-IC2] should write summary, delegation body and sign-off', async () => {
      const commit = await creator.createInceptionCommit(key, ALICE);

      expect(commit.message).toBe(
        `${INCEPTION_SUMMARY}\n\n${INCEPTION_BODY}\n\nSigned-off-by: Alice <alice@example.com>\n`
      );
    });

    it('[EARS-IC3] should commit under the key fingerprint with the author email', async () => {
      const commit = await creator.createInceptionCommit(key, ALICE);

      expect(commit.author.name).toBe('Alice');
      expect(commit.committer.name).toBe(key.fingerprint);
      expect(commit.committer.name).toMatch(/^SHA256:[A-Za-z0-9+/]{43}$/);
      expect(commit.committer.email).toBe('alice@example.com');
    });

    it('[EARS-IC4] should use one instant for author and committer', async () => {
      const commit = await creator.createInceptionCommit(key, ALICE, { date: new Date('2024-03-01T12:00:00Z') });

      expect(commit.author.timestamp).toBe(1709294400);
      expect(commit.committer.timestamp).toBe(1709294400);
      expect(commit.author.timezone).toBe('+0000');
    });

    it('[EARS-IC5] should trim the author identity', async () => {
      const commit = await creator.createInceptionCommit(key, { name: '  Alice ', email: ' alice@example.com' });

      expect(commit.message.endsWith('Signed-off-by: Alice <alice@example.com>\n')).toBe(true);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Preconditions and failures (EARS-IC6 to IC11)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('Preconditions and failures (EARS-IC6 to IC11)', () => {
    it('[EARS-IC6] should reject a missing name or email', async () => {
      await expect(creator.createInceptionCommit(key, { name: '', email: 'a@example.com' })).rejects.toThrow(UsageError);
      await expect(creator.createInceptionCommit(key, { name: 'A', email: '  ' })).rejects.toThrow(UsageError);
    });

    it('[EARS-IC7] should reject an invalid date', async () => {
      await expect(creator.createInceptionCommit(key, ALICE, { date: new Date('nope') })).rejects.toThrow(UsageError);
    });

    it('[EARS-IC8] should refuse a repository that already has commits', async () => {
      git.addCommit();

      await expect(creator.createInceptionCommit(key, ALICE)).rejects.toThrow(RepositoryError);
    });

    it('[EARS-IC9] should raise SigningError for a key without a usable public key', async () => {
      const broken: SigningKey = { ...key, publicKey: 'not a key' };

      await expect(creator.createInceptionCommit(broken, ALICE)).rejects.toThrow(SigningError);
      expect(await git.hasCommits()).toBe(false);
    });

    it('[EARS-IC10] should raise SigningError when signing is rejected', async () => {
      const publicOnly = keys.addPublicKeyOnly('public-only', key.publicKey);

      const error = await creator.createInceptionCommit(publicOnly, ALICE).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SigningError);
      expect(error).toMatchObject({ code: 'SIGNING' });
      expect(await git.hasCommits()).toBe(false);
    });

    it('[EARS-IC11] should raise RepositoryError for other git failures', async () => {
      jest.spyOn(git, 'createEmptySignedCommit').mockRejectedValue(new GitCommandError('Failed to create commit', 'fatal: disk full'));

      await expect(creator.createInceptionCommit(key, ALICE)).rejects.toThrow('Failed to create inception commit: Failed to create commit');
    });
  });
});
