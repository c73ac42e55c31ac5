import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { PassThrough } from 'stream';
import { main, parseCliArgs, promptForForm } from './kmz-survey-export.js';
import { SurveyExportPipeline } from '../services/survey/SurveyExportPipeline.js';
import { ConfigurationError, SelectionError } from '../types/errors.js';
import { buildKmz } from '../test-utils/kmzFixtures.js';

describe('parseCliArgs', () => {
  it('reads the input path and options', () => {
    expect(
      parseCliArgs(['survey.kmz', '--form=2', '--out-dir', 'exports', '--delimiter=\\t', '--drop-unclassified'])
    ).toEqual({
      config: { inputPath: 'survey.kmz', outputDir: 'exports', delimiter: '\t', dropUnclassified: true },
      form: '2',
      listOnly: false,
    });
  });

  it('recognises --list', () => {
    expect(parseCliArgs(['--list', 'survey.kmz'])).toEqual({
      config: { inputPath: 'survey.kmz' },
      listOnly: true,
    });
  });

  it('rejects unknown options, missing values and extra arguments', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(['survey.kmz', '--form'])).toThrow('Option --form requires a value');
    expect(() => parseCliArgs(['a.kmz', 'b.kmz'])).toThrow('Expected one input archive, got 2');
  });
});

describe('promptForForm', () => {
  it('resolves with the answered line', async () => {
    const input = new PassThrough();
    const answer = promptForForm(3, input, new PassThrough());
    input.end('2\n');

    await expect(answer).resolves.toBe('2');
  });

  it('fails with a SelectionError when the input ends unanswered', async () => {
    const input = new PassThrough();
    const answer = promptForForm(3, input, new PassThrough());
    input.end();

    await expect(answer).rejects.toBeInstanceOf(SelectionError);
    await expect(answer).rejects.toThrow('No form selected: input ended before an answer was given');
  });
});

describe('main', () => {
  let tempDir: string;
  let archivePath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kmz-cli-'));
    archivePath = path.join(tempDir, 'survey.kmz');
    await fs.writeFile(
      archivePath,
      await buildKmz([
        { name: 'Well 1', coordinates: '1,2,3', description: '<h1>Wells</h1><table><tr><td>Depth</td><td>4</td></tr></table>' },
        { name: 'Oak', coordinates: '5,6', description: '<h1>Trees</h1>' },
      ])
    );
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('exports the chosen form', async () => {
    const outDir = path.join(tempDir, 'out');

    const exitCode = await main([archivePath, `--out-dir=${outDir}`, '--form=2']);

    expect(exitCode).toBe(0);
    expect(await fs.readFile(path.join(outDir, 'wells.csv'), 'utf-8')).toBe(
      'name,longitude,latitude,altitude,Depth\nWell 1,1,2,3,4\n'
    );
  });

  it('only lists forms with --list', async () => {
    const outDir = path.join(tempDir, 'out');

    const exitCode = await main([archivePath, `--out-dir=${outDir}`, '--list']);

    expect(exitCode).toBe(0);
    expect(console.log).toHaveBeenCalledWith('   1: Trees (1)');
    expect(console.log).toHaveBeenCalledWith('   2: Wells (1)');
    await expect(fs.access(outDir)).rejects.toThrow();
  });

  it('fails without writing output for an invalid choice', async () => {
    const outDir = path.join(tempDir, 'out');

    const exitCode = await main([archivePath, `--out-dir=${outDir}`, '--form=7']);

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('❌ Invalid choice 7: expected a number between 1 and 2');
    await expect(fs.access(outDir)).rejects.toThrow();
  });

  it('reports a missing archive', async () => {
    const missing = path.join(tempDir, 'absent.kmz');

    expect(await main([missing, '--form=1'])).toBe(1);
  });

  it('reports unexpected failures as internal errors', async () => {
    vi.spyOn(SurveyExportPipeline.prototype, 'readForms').mockRejectedValue(new TypeError('stream went away'));

    const exitCode = await main([archivePath, '--form=1']);

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('❌ An error occurred: stream went away');
  });
});
