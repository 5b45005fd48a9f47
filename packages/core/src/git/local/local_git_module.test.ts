/**
 * LocalGitModule Tests
 *
 * The git binary is replaced by a scripted execCommand, so these tests
 * assert the exact commands issued and how their output is interpreted.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LocalGitModule } from './local_git_module';
import {
  GitCommandError,
  CommitSigningError,
  CommitNotFoundError,
  SignatureVerificationUnavailableError,
  BranchNotFoundError,
  BranchAlreadyExistsError,
} from '../errors';
import type { ExecCommandFn, ExecOptions, ExecResult } from '../types';

type Call = { command: string; args: string[]; options: ExecOptions | undefined };

const ok = (stdout: string = ''): ExecResult => ({ exitCode: 0, stdout, stderr: '' });
const fail = (exitCode: number, stderr: string = '', stdout: string = ''): ExecResult => ({ exitCode, stdout, stderr });

/**
 * Test Helper: execCommand answering each call from a queue of results
 */
function createScriptedExec(results: ExecResult[]): { exec: ExecCommandFn; calls: Call[] } {
  const calls: Call[] = [];
  const queue = [...results];
  const exec = jest.fn(async (command: string, args: string[], options?: ExecOptions) => {
    calls.push({ command, args, options });
    const next = queue.shift();
    if (!next) {
      throw new Error(`Unexpected command: ${command} ${args.join(' ')}`);
    }
    return next;
  });
  return { exec, calls };
}

const RAW_COMMIT = [
  'tree 4b825dc642cb6eb9a060e54bf8d69288fbee4904',
  'author Alice <alice@example.com> 1700000000 +0000',
  'committer SHA256:V8VhksKdtKHS7h9ITJDkMYv61TZzGChcr3Vo7uKDf1Y <alice@example.com> 1700000000 +0000',
  'gpgsig -----BEGIN SSH SIGNATURE-----',
  ' U1NIU0lHAAAAAQ==',
  ' -----END SSH SIGNATURE-----',
  '',
  'Initialize repository',
  '',
].join('\n');

describe('LocalGitModule', () => {
  const repoRoot = '/work/repo';

  // ═══════════════════════════════════════════════════════════════════════════
  // Initialization (EARS-LG1 to LG4)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('Initialization (EARS-LG1 to LG4)', () => {
    it('[EARS-LG1] should run git init with the initial branch', async () => {
      const { exec, calls } = createScriptedExec([fail(128, 'fatal: not a git repository'), ok()]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await git.init('main');

      expect(calls[1]?.args).toEqual(['init', '--initial-branch=main']);
      expect(calls[1]?.options?.cwd).toBe(repoRoot);
    });

    it('[EARS-LG2] should refuse to re-initialize an existing repository root', async () => {
      const { exec } = createScriptedExec([ok(`${repoRoot}\n`)]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.init()).rejects.toThrow('Directory is already a Git repository');
    });

    it('[EARS-LG3] should initialize a subdirectory of another repository', async () => {
      const { exec } = createScriptedExec([ok('/work\n'), ok()]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.init()).resolves.toBeUndefined();
    });

    it('[EARS-LG4] should auto-detect repoRoot', async () => {
      const { exec } = createScriptedExec([ok(`${repoRoot}\n`)]);
      const git = new LocalGitModule({ execCommand: exec });

      expect(await git.getRepoRoot()).toBe(repoRoot);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Read operations (EARS-LG5 to LG12)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('Read operations (EARS-LG5 to LG12)', () => {
    it('[EARS-LG5] should report whether HEAD resolves to a commit', async () => {
      const { exec, calls } = createScriptedExec([fail(1), ok('abc\n')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      expect(await git.hasCommits()).toBe(false);
      expect(await git.hasCommits()).toBe(true);
      expect(calls[0]?.args).toEqual(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}']);
    });

    it('[EARS-LG6] should parse the git version', async () => {
      const { exec } = createScriptedExec([ok('git version 2.39.5\n')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      expect(await git.getVersion()).toBe('2.39.5');
    });

    it('[EARS-LG7] should return null for unset config and pass the scope', async () => {
      const { exec, calls } = createScriptedExec([fail(1), ok('Alice\n')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      expect(await git.getConfig('user.name')).toBeNull();
      expect(await git.getConfig('user.name', 'global')).toBe('Alice');
      expect(calls[1]?.args).toEqual(['config', '--global', '--get', 'user.name']);
    });

    it('[EARS-LG8] should write config at local scope by default', async () => {
      const { exec, calls } = createScriptedExec([ok(), fail(255, 'error: could not lock config file')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await git.setConfig('commit.gpgsign', 'true');
      expect(calls[0]?.args).toEqual(['config', '--local', 'commit.gpgsign', 'true']);
      await expect(git.setConfig('user.name', 'x', 'global')).rejects.toThrow(GitCommandError);
    });

    it('[EARS-LG9] should list root commits and return none for an unborn branch', async () => {
      const { exec, calls } = createScriptedExec([fail(1), ok('abc\n'), ok('c2\nc1\n')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      expect(await git.getRootCommits()).toEqual([]);
      expect(await git.getRootCommits('main')).toEqual(['c2', 'c1']);
      expect(calls[2]?.args).toEqual(['rev-list', '--max-parents=0', 'main']);
    });

    it('[EARS-LG10] should parse commit objects from cat-file', async () => {
      const { exec } = createScriptedExec([ok(RAW_COMMIT)]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      const details = await git.getCommitDetails('abc');

      expect(details.treeId).toBe('4b825dc642cb6eb9a060e54bf8d69288fbee4904');
      expect(details.parents).toEqual([]);
      expect(details.committer.name).toBe('SHA256:V8VhksKdtKHS7h9ITJDkMYv61TZzGChcr3Vo7uKDf1Y');
      expect(details.signature).toBe('-----BEGIN SSH SIGNATURE-----\nU1NIU0lHAAAAAQ==\n-----END SSH SIGNATURE-----');
      expect(details.message).toBe('Initialize repository\n');
    });

    it('[EARS-LG11] should raise CommitNotFoundError when cat-file fails', async () => {
      const { exec } = createScriptedExec([fail(128, 'fatal: Not a valid object name nope')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.getCommitDetails('nope')).rejects.toThrow(CommitNotFoundError);
    });

    it('[EARS-LG12] should return null for a missing remote', async () => {
      const { exec } = createScriptedExec([fail(2, "error: No such remote 'origin'"), ok('https://example.com/r.git\n')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      expect(await git.getRemoteUrl('origin')).toBeNull();
      expect(await git.getRemoteUrl('origin')).toBe('https://example.com/r.git');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Signature verification (EARS-LG13 to LG18)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('Signature verification (EARS-LG13 to LG18)', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'local-git-verify-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('[EARS-LG13] should report a good signature and its principal', async () => {
      // ssh-keygen prints the good signature line on stderr
      const goodOutput = 'Good "git" signature for alice@example.com with ED25519 key SHA256:V8Vh';
      const { exec, calls } = createScriptedExec([{ exitCode: 0, stdout: '', stderr: goodOutput }]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      const result = await git.verifyCommitSignature('abc');

      expect(result).toEqual({ status: 'valid', signer: 'alice@example.com', output: goodOutput });
      expect(calls[0]?.args).toEqual(['verify-commit', 'abc']);
    });

    it('[EARS-LG14] should pass an explicit allowed signers file', async () => {
      const signersFile = path.join(tempDir, 'allowed_signers');
      fs.writeFileSync(signersFile, 'alice@example.com ssh-ed25519 AAAA\n');
      const { exec, calls } = createScriptedExec([ok()]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await git.verifyCommitSignature('abc', { allowedSignersFile: signersFile });

      expect(calls[0]?.args).toEqual(['-c', `gpg.ssh.allowedSignersFile=${signersFile}`, 'verify-commit', 'abc']);
    });

    it('[EARS-LG15] should raise SignatureVerificationUnavailableError for a missing signers file', async () => {
      const { exec } = createScriptedExec([]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.verifyCommitSignature('abc', { allowedSignersFile: path.join(tempDir, 'missing') }))
        .rejects.toThrow(SignatureVerificationUnavailableError);
      expect(exec).not.toHaveBeenCalled();
    });

    it('[EARS-LG16] should treat empty failure output as an unsigned commit', async () => {
      const { exec } = createScriptedExec([fail(1)]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      expect(await git.verifyCommitSignature('abc')).toEqual({ status: 'unsigned', output: '' });
    });

    it('[EARS-LG17] should report rejected signatures as invalid', async () => {
      const { exec } = createScriptedExec([
        fail(1, 'Signature verification failed: incorrect signature'),
        fail(1, 'No principal matched.'),
      ]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      expect((await git.verifyCommitSignature('abc')).status).toBe('invalid');
      expect((await git.verifyCommitSignature('abc')).status).toBe('invalid');
    });

    it('[EARS-LG18] should raise SignatureVerificationUnavailableError when verification cannot run', async () => {
      const { exec } = createScriptedExec([
        fail(1, 'error: gpg.ssh.allowedSignersFile needs to be configured and exist for ssh signature verification'),
        fail(1, 'error: cannot run ssh-keygen: No such file or directory'),
      ]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.verifyCommitSignature('abc')).rejects.toThrow(SignatureVerificationUnavailableError);
      await expect(git.verifyCommitSignature('abc')).rejects.toThrow(SignatureVerificationUnavailableError);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Write operations (EARS-LG19 to LG24)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('Write operations (EARS-LG19 to LG24)', () => {
    const author = { name: 'Alice', email: 'alice@example.com', timestamp: 1700000000, timezone: '+0000' };
    const committer = { ...author, name: 'SHA256:V8VhksKdtKHS7h9ITJDkMYv61TZzGChcr3Vo7uKDf1Y' };

    it('[EARS-LG19] should sign the empty tree with commit-tree and move HEAD', async () => {
      const { exec, calls } = createScriptedExec([
        ok('4b825dc642cb6eb9a060e54bf8d69288fbee4904\n'),
        ok('c0ffee\n'),
        ok(RAW_COMMIT),
        ok(),
      ]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      const hash = await git.createEmptySignedCommit({
        message: 'Initialize repository',
        author,
        committer,
        signingKey: '/home/alice/.ssh/id_ed25519',
      });

      expect(hash).toBe('c0ffee');
      expect(calls[1]?.args).toEqual([
        '-c', 'gpg.format=ssh',
        '-c', 'user.signingkey=/home/alice/.ssh/id_ed25519',
        'commit-tree', '-S', '4b825dc642cb6eb9a060e54bf8d69288fbee4904',
        '-m', 'Initialize repository',
      ]);
      expect(calls[1]?.options?.env).toEqual({
        GIT_AUTHOR_NAME: 'Alice',
        GIT_AUTHOR_EMAIL: 'alice@example.com',
        GIT_AUTHOR_DATE: '@1700000000 +0000',
        GIT_COMMITTER_NAME: 'SHA256:V8VhksKdtKHS7h9ITJDkMYv61TZzGChcr3Vo7uKDf1Y',
        GIT_COMMITTER_EMAIL: 'alice@example.com',
        GIT_COMMITTER_DATE: '@1700000000 +0000',
      });
      expect(calls[2]?.args).toEqual(['cat-file', 'commit', 'c0ffee']);
      expect(calls[3]?.args).toEqual(['update-ref', 'HEAD', 'c0ffee']);
    });

    it('[EARS-LG20] should raise CommitSigningError when the key cannot be loaded', async () => {
      const { exec, calls } = createScriptedExec([
        ok('4b825dc642cb6eb9a060e54bf8d69288fbee4904\n'),
        fail(1, 'error: Couldn\'t load public key /nope: No such file or directory?'),
      ]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.createEmptySignedCommit({ message: 'x', author, committer, signingKey: '/nope' }))
        .rejects.toThrow(CommitSigningError);
      expect(calls).toHaveLength(2);
    });

    it('[EARS-LG21] should push a source to a named remote branch', async () => {
      const { exec, calls } = createScriptedExec([ok()]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await git.push('origin', 'c0ffee', 'main', true);

      expect(calls[0]?.args).toEqual(['push', '-u', 'origin', 'c0ffee:refs/heads/main']);
    });

    it('[EARS-LG22] should raise GitCommandError with stderr when remote commands fail', async () => {
      const { exec } = createScriptedExec([fail(3, 'error: remote origin already exists.')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      const error = await git.addRemote('origin', 'https://example.com/r.git').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitCommandError);
      expect(error).toMatchObject({ stderr: 'error: remote origin already exists.' });
    });

    it('[EARS-LG23] should leave HEAD alone when commit-tree stores no signature', async () => {
      const unsigned = RAW_COMMIT.split('\n').filter((line) => !line.startsWith('gpgsig') && !line.startsWith(' ')).join('\n');
      const { exec, calls } = createScriptedExec([
        ok('4b825dc642cb6eb9a060e54bf8d69288fbee4904\n'),
        ok('c0ffee\n'),
        ok(unsigned),
      ]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.createEmptySignedCommit({ message: 'x', author, committer, signingKey: '/home/alice/.ssh/id_ed25519' }))
        .rejects.toThrow(CommitSigningError);
      expect(calls.map((call) => call.args[0])).not.toContain('update-ref');
      expect(calls).toHaveLength(3);
    });

    it('[EARS-LG24] should accept the gpgsig-sha256 header of a SHA-256 repository', async () => {
      const sha256Tree = '6ef19b41225c5369f1c104d45d8d85efa9b057b53b14b4b9b939dd74decc5321';
      const sha256Commit = 'a'.repeat(64);
      const raw = RAW_COMMIT
        .replace('4b825dc642cb6eb9a060e54bf8d69288fbee4904', sha256Tree)
        .replace('gpgsig -----BEGIN', 'gpgsig-sha256 -----BEGIN');
      const { exec, calls } = createScriptedExec([
        ok(`${sha256Tree}\n`),
        ok(`${sha256Commit}\n`),
        ok(raw),
        ok(),
      ]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      const hash = await git.createEmptySignedCommit({ message: 'x', author, committer, signingKey: '/home/alice/.ssh/id_ed25519' });

      expect(hash).toBe(sha256Commit);
      expect(calls[3]?.args).toEqual(['update-ref', 'HEAD', sha256Commit]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Branches and commits (EARS-LG25 to LG29)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('Branches and commits (EARS-LG25 to LG29)', () => {
    it('[EARS-LG25] should read the current branch through symbolic-ref', async () => {
      const { exec, calls } = createScriptedExec([ok('main\n'), fail(128, 'fatal: ref HEAD is not a symbolic ref')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      expect(await git.getCurrentBranch()).toBe('main');
      expect(calls[0]?.args).toEqual(['symbolic-ref', '--short', 'HEAD']);
      await expect(git.getCurrentBranch()).rejects.toThrow('HEAD is not on a branch');
    });

    it('[EARS-LG26] should create a branch only when it does not exist', async () => {
      const { exec, calls } = createScriptedExec([fail(1), ok(), ok()]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await git.createBranch('docs/import-existing-materials');

      expect(calls[0]?.args).toEqual(['show-ref', '--verify', '--quiet', 'refs/heads/docs/import-existing-materials']);
      expect(calls[1]?.args).toEqual(['checkout', '-b', 'docs/import-existing-materials']);
      await expect(git.createBranch('main')).rejects.toThrow(BranchAlreadyExistsError);
    });

    it('[EARS-LG27] should refuse to check out a missing branch', async () => {
      const { exec, calls } = createScriptedExec([fail(1), ok(), ok()]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.checkoutBranch('missing')).rejects.toThrow(BranchNotFoundError);
      await git.checkoutBranch('main');

      expect(calls[2]?.args).toEqual(['checkout', 'main']);
    });

    it('[EARS-LG28] should stage paths and commit them signed with a sign-off', async () => {
      const commitHash = 'c'.repeat(40);
      const { exec, calls } = createScriptedExec([ok(), ok(), ok(`${commitHash}\n`)]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await git.add(['README.md', 'requirements/pr_process.md']);
      const hash = await git.commit('Add files\n\n- README.md', { sign: true, signoff: true });

      expect(hash).toBe(commitHash);
      expect(calls[0]?.args).toEqual(['add', '--', 'README.md', 'requirements/pr_process.md']);
      expect(calls[1]?.args).toEqual(['commit', '-S', '-s', '-m', 'Add files\n\n- README.md']);
      expect(calls[2]?.args).toEqual(['rev-parse', 'HEAD']);
    });

    it('[EARS-LG29] should raise CommitSigningError when commit signing fails', async () => {
      const { exec } = createScriptedExec([fail(128, 'error: Couldn\'t load public key /home/alice/.ssh/id_ed25519.pub')]);
      const git = new LocalGitModule({ repoRoot, execCommand: exec });

      await expect(git.commit('x', { sign: true })).rejects.toThrow(CommitSigningError);
    });
  });
});
