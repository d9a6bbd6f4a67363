import { test } from 'node:test';
import { expect } from 'chai';
import {
  branchName,
  branchVersion,
  calculateNames,
  fallbackTagName,
  parseReleaseVersion,
  releaseVersion,
  releaseVersionFromComponents,
  tagName,
} from './version.js';
import { InvalidVersionError } from '../lib/error.js';

test('parseReleaseVersion', async (t) => {
  await t.test('parses major.minor without incremental', () => {
    expect(parseReleaseVersion('1.2')).to.deep.equal({
      major: '1',
      minor: '2',
      incremental: null,
    });
  });

  await t.test('parses incremental', () => {
    expect(parseReleaseVersion('1.2.3').incremental).to.equal('3');
  });

  await t.test('ignores parts past the third', () => {
    expect(parseReleaseVersion('1.2.3.4')).to.deep.equal({
      major: '1',
      minor: '2',
      incremental: '3',
    });
  });

  await t.test('drops trailing empty parts', () => {
    expect(parseReleaseVersion('1.2.').incremental).to.equal(null);
  });

  await t.test('keeps a non-numeric incremental until bump time', () => {
    expect(parseReleaseVersion('1.2.x').incremental).to.equal('x');
  });

  await t.test('returns a frozen value', () => {
    expect(Object.isFrozen(parseReleaseVersion('1.2'))).to.equal(true);
  });

  await t.test('rejects a single component', () => {
    expect(() => parseReleaseVersion('1')).to.throw(InvalidVersionError, 'Invalid version: 1');
  });

  await t.test('rejects empty input', () => {
    expect(() => parseReleaseVersion('')).to.throw(InvalidVersionError);
  });

  await t.test('rejects empty major or minor', () => {
    expect(() => parseReleaseVersion('.2')).to.throw(InvalidVersionError);
    expect(() => parseReleaseVersion('1..3')).to.throw(InvalidVersionError);
  });
});

test('releaseVersionFromComponents', async (t) => {
  await t.test('returns null without a major version', () => {
    expect(releaseVersionFromComponents({})).to.equal(null);
    expect(releaseVersionFromComponents({ major: null, minor: '1' })).to.equal(null);
  });

  await t.test('builds a version from components', () => {
    expect(releaseVersionFromComponents({ major: '4', minor: '0', incremental: '2' }))
      .to.deep.equal({ major: '4', minor: '0', incremental: '2' });
  });

  await t.test('treats an empty incremental as absent', () => {
    expect(releaseVersionFromComponents({ major: '4', minor: '0', incremental: '' })?.incremental)
      .to.equal(null);
  });

  await t.test('rejects a missing minor', () => {
    expect(() => releaseVersionFromComponents({ major: '4' })).to.throw(InvalidVersionError);
  });
});

test('name derivation without incremental', async (t) => {
  const v = parseReleaseVersion('2.3');

  await t.test('releaseVersion', () => {
    expect(releaseVersion(v)).to.equal('2.3');
  });

  await t.test('tagName', () => {
    expect(tagName('foo', v)).to.equal('foo-2.3');
  });

  await t.test('branchName', () => {
    expect(branchName('foo', v)).to.equal('foo-2.3.x');
  });

  await t.test('branchVersion starts at 1', () => {
    expect(branchVersion(v)).to.equal('2.3.1-SNAPSHOT');
  });
});

test('name derivation with incremental', async (t) => {
  const v = parseReleaseVersion('2.3.5');

  await t.test('tagName keeps the incremental', () => {
    expect(tagName('foo', v)).to.equal('foo-2.3.5');
  });

  await t.test('branchName always uses x', () => {
    expect(branchName('foo', v)).to.equal('foo-2.3.x');
  });

  await t.test('branchVersion increments', () => {
    expect(branchVersion(v)).to.equal('2.3.6-SNAPSHOT');
  });

  await t.test('branchVersion handles multi-digit incrementals', () => {
    expect(branchVersion(parseReleaseVersion('10.20.99'))).to.equal('10.20.100-SNAPSHOT');
  });

  await t.test('branchVersion rejects a non-numeric incremental', () => {
    expect(() => branchVersion(parseReleaseVersion('1.2.x'))).to.throw(
      InvalidVersionError,
      'Invalid incremental version: x',
    );
  });

  await t.test('branchVersion rejects a decimal incremental', () => {
    expect(() =>
      branchVersion({ major: '1', minor: '2', incremental: '1.5' })
    ).to.throw(InvalidVersionError);
  });

  await t.test('branchVersion rejects a suffixed incremental', () => {
    expect(() => branchVersion(parseReleaseVersion('1.2.3a'))).to.throw(InvalidVersionError);
  });
});

test('calculateNames', async (t) => {
  await t.test('derives all names', () => {
    expect(calculateNames('foo', parseReleaseVersion('2.3'))).to.deep.equal({
      releaseVersion: '2.3',
      tagName: 'foo-2.3',
      branchName: 'foo-2.3.x',
      branchVersion: '2.3.1-SNAPSHOT',
    });
  });

  await t.test('is deterministic', () => {
    const first = calculateNames('foo', parseReleaseVersion('2.3.5'));
    const second = calculateNames('foo', parseReleaseVersion('2.3.5'));
    expect(second).to.deep.equal(first);
  });
});

test('fallbackTagName', async (t) => {
  await t.test('strips the trailing segment', () => {
    expect(fallbackTagName('foo-2.3.5')).to.equal('foo-2.3');
  });

  await t.test('truncates at the last dot only', () => {
    expect(fallbackTagName('foo-2.3')).to.equal('foo-2');
  });

  await t.test('returns a dotless tag unchanged', () => {
    expect(fallbackTagName('foo')).to.equal('foo');
  });
});
