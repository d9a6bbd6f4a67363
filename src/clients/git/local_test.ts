/**
 * Tests for LocalGit against a scripted runner.
 */

import { test } from 'node:test';
import { expect } from 'chai';
import { LocalGit } from './local.js';
import { MaintenanceError } from '../../lib/error.js';
import { FakeRunner, MemoryLogger, rejectionOf } from '../../../tests/helpers.js';

test('LocalGit working tree checks', async (t) => {
  await t.test('diffWorkingTree runs git diff --exit-code', async () => {
    const runner = new FakeRunner().on('git diff --exit-code', { exitCode: 1, output: 'M a.txt' });
    const git = new LocalGit(runner, new MemoryLogger());

    const result = await git.diffWorkingTree();

    expect(result.exitCode).to.equal(1);
    expect(runner.calls).to.deep.equal([['git', 'diff', '--exit-code']]);
  });

  await t.test('diffIndex checks staged changes', async () => {
    const runner = new FakeRunner();
    const git = new LocalGit(runner, new MemoryLogger());

    await git.diffIndex();

    expect(runner.commands).to.deep.equal(['git diff --cached --exit-code']);
  });

  await t.test('logs command output at debug level', async () => {
    const runner = new FakeRunner().on('git diff --exit-code', { exitCode: 1, output: 'M a.txt' });
    const logger = new MemoryLogger();
    const git = new LocalGit(runner, logger);

    await git.diffWorkingTree();

    expect(logger.debugs).to.deep.equal(['git diff output: M a.txt']);
    expect(logger.infos).to.deep.equal([]);
  });
});

test('LocalGit branch operations', async (t) => {
  await t.test('checkoutNewBranch creates the branch from a ref', async () => {
    const runner = new FakeRunner();
    const git = new LocalGit(runner, new MemoryLogger());

    const result = await git.checkoutNewBranch('foo-2.3.x', 'foo-2.3.5');

    expect(result.exitCode).to.equal(0);
    expect(runner.calls).to.deep.equal([['git', 'checkout', '-b', 'foo-2.3.x', 'foo-2.3.5']]);
  });

  await t.test('commitAll commits tracked files with the message', async () => {
    const runner = new FakeRunner();
    const git = new LocalGit(runner, new MemoryLogger());

    await git.commitAll('preparing maintenance branch for development');

    expect(runner.calls).to.deep.equal([
      ['git', 'commit', '-am', 'preparing maintenance branch for development'],
    ]);
  });

  await t.test('returns non-zero results instead of throwing', async () => {
    const runner = new FakeRunner().on('git commit -am msg', { exitCode: 1, output: 'nothing to commit' });
    const git = new LocalGit(runner, new MemoryLogger());

    const result = await git.commitAll('msg');

    expect(result).to.deep.equal({ exitCode: 1, output: 'nothing to commit' });
  });
});

test('LocalGit tag operations', async (t) => {
  await t.test('listTags splits output into names', async () => {
    const runner = new FakeRunner().on('git tag --list foo-*', {
      exitCode: 0,
      output: 'foo-1.0\nfoo-1.1\n\n',
    });
    const git = new LocalGit(runner, new MemoryLogger());

    expect(await git.listTags('foo-*')).to.deep.equal(['foo-1.0', 'foo-1.1']);
  });

  await t.test('listTags returns empty list without tags', async () => {
    const git = new LocalGit(new FakeRunner(), new MemoryLogger());

    expect(await git.listTags('foo-*')).to.deep.equal([]);
  });

  await t.test('listTags throws when git fails', async () => {
    const runner = new FakeRunner().on('git tag --list foo-*', {
      exitCode: 128,
      output: 'fatal: not a git repository',
    });
    const git = new LocalGit(runner, new MemoryLogger());

    const error = await rejectionOf(git.listTags('foo-*'));

    expect(error).to.be.instanceOf(MaintenanceError);
    if (error instanceof MaintenanceError) {
      expect(error.code).to.equal('GIT_ERROR');
    }
  });
});
