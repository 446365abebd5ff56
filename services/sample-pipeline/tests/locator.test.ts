import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PipelineError } from '../src/errors';
import { SampleLocator, compareSampleNames } from '../src/samples/locator';
import { createTempDir, removeDir, silentLogger, writeSamples } from './helpers';

function createLocator(): SampleLocator {
  return new SampleLocator({
    domainTaskSuffix: '_task',
    artifactExtensions: ['.png', '.mp4'],
    logger: silentLogger
  });
}

function isNotFound(err: unknown): boolean {
  return err instanceof PipelineError && err.code === 'NOT_FOUND';
}

describe('compareSampleNames', () => {
  it('orders by the last integer in the name and puts digitless names last', () => {
    const names = ['sample_10', 'extra', 'sample_2', 'run1_sample_3', 'alpha'];
    assert.deepEqual(names.sort(compareSampleNames), ['sample_2', 'run1_sample_3', 'sample_10', 'alpha', 'extra']);
  });

  it('compares integers beyond the safe double range exactly', () => {
    const names = ['a_9007199254740993', 'b_9007199254740992'];
    assert.deepEqual(names.sort(compareSampleNames), ['b_9007199254740992', 'a_9007199254740993']);
  });
});

describe('SampleLocator', () => {
  let root: string;

  before(async () => {
    root = await createTempDir();
  });

  after(async () => {
    await removeDir(root);
  });

  it('prefers data/questions when the generator wrote one', async () => {
    const outputDir = path.join(root, 'with-questions');
    await writeSamples(outputDir, 'shapes_task', [{ name: 'a' }]);
    assert.equal(await createLocator().findQuestionsDirectory(outputDir), path.join(outputDir, 'data', 'questions'));
  });

  it('falls back to the output root', async () => {
    const outputDir = path.join(root, 'flat');
    await mkdir(path.join(outputDir, 'nested', 'shapes_task', 'a'), { recursive: true });
    assert.equal(await createLocator().findQuestionsDirectory(outputDir), outputDir);
    assert.deepEqual(await createLocator().findDomainTaskDirectories(outputDir), [
      path.join(outputDir, 'nested', 'shapes_task')
    ]);
  });

  it('reports a missing output directory or one without domain tasks as NOT_FOUND', async () => {
    const locator = createLocator();
    await assert.rejects(locator.findQuestionsDirectory(path.join(root, 'absent')), isNotFound);
    const empty = path.join(root, 'empty');
    await mkdir(path.join(empty, 'data', 'questions', 'unrelated'), { recursive: true });
    await assert.rejects(locator.findQuestionsDirectory(empty), isNotFound);
  });

  it('deletes candidates without artifacts and renames the rest contiguously', async () => {
    const outputDir = path.join(root, 'rename');
    const domainTaskDir = await writeSamples(outputDir, 'shapes_task', [
      { name: 'sample_2', files: { 'frames/clip.MP4': 'video' } },
      { name: 'sample_10' },
      { name: 'sample_1' },
      { name: 'notes', files: { 'readme.md': 'no artifacts here' } }
    ]);

    const ids = await createLocator().renameSamples(domainTaskDir, 10);

    assert.deepEqual(ids, ['10', '11', '12']);
    assert.deepEqual((await readdir(domainTaskDir)).sort(), ['10', '11', '12']);
    assert.equal(await readFile(path.join(domainTaskDir, '10', 'image.png'), 'utf8'), 'png:sample_1');
    assert.equal(await readFile(path.join(domainTaskDir, '11', 'frames', 'clip.MP4'), 'utf8'), 'video');
    assert.equal(await readFile(path.join(domainTaskDir, '12', 'image.png'), 'utf8'), 'png:sample_10');
  });

  it('does not clobber a candidate whose name equals a target id', async () => {
    const outputDir = path.join(root, 'collide');
    const domainTaskDir = await writeSamples(outputDir, 'shapes_task', [{ name: '0' }, { name: '1' }]);
    await writeFile(path.join(domainTaskDir, '0', 'image.png'), 'first');
    await writeFile(path.join(domainTaskDir, '1', 'image.png'), 'second');

    const ids = await createLocator().renameSamples(domainTaskDir, 1);

    assert.deepEqual(ids, ['1', '2']);
    assert.equal(await readFile(path.join(domainTaskDir, '1', 'image.png'), 'utf8'), 'first');
    assert.equal(await readFile(path.join(domainTaskDir, '2', 'image.png'), 'utf8'), 'second');
  });

  it('collects generated sample paths across domain tasks', async () => {
    const outputDir = path.join(root, 'collect');
    await writeSamples(outputDir, 'a_task', [{ name: 's1' }, { name: 's0' }]);
    await writeSamples(outputDir, 'b_task', [{ name: 's5' }]);

    const questions = path.join(outputDir, 'data', 'questions');
    assert.deepEqual(await createLocator().collectGeneratedSamples(outputDir), [
      path.join(questions, 'a_task', 's0'),
      path.join(questions, 'a_task', 's1'),
      path.join(questions, 'b_task', 's5')
    ]);
  });
});
