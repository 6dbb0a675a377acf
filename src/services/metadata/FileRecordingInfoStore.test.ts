import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RecordingRequest } from '../../types';
import { FileRecordingInfoStore } from './FileRecordingInfoStore';
import { generateFolderName, parseRecordingNumber, sanitizeForFilename } from './RecordingInfo';

const request: RecordingRequest = {
  title: 'Intro to Flakes!',
  description: 'A short walkthrough',
  topic: 'nix',
  presenter: 'Test Presenter',
  recordAudio: true,
  recordScreen: true,
  recordWebcam: false,
  verticalVideo: false,
  logos: { left: '/tmp/logo-left.png', titleColor: '#62A4C7' }
};

const fixedNow = () => new Date('2026-03-01T10:00:00.000Z');

describe('recording folder names', () => {
  it('sanitizes titles into slugs', () => {
    expect(sanitizeForFilename('Intro to Flakes!')).toBe('intro-to-flakes');
    expect(sanitizeForFilename('  -- Hello   World --  ')).toBe('hello-world');
    expect(sanitizeForFilename('snake_case ok')).toBe('snake_case-ok');
    expect(sanitizeForFilename('a'.repeat(60))).toBe('a'.repeat(50));
  });

  it('pads the number and falls back to a default slug', () => {
    expect(generateFolderName(7, 'Intro to Flakes!')).toBe('007-intro-to-flakes');
    expect(generateFolderName(12, '!!!')).toBe('012-recording');
    expect(generateFolderName(1234, 'x')).toBe('1234-x');
  });

  it('reads numbers back out of folder names', () => {
    expect(parseRecordingNumber('042-tutorial')).toBe(42);
    expect(parseRecordingNumber('1234-x')).toBe(1234);
    expect(parseRecordingNumber('42-short')).toBeUndefined();
    expect(parseRecordingNumber('notes')).toBeUndefined();
  });
});

describe('FileRecordingInfoStore', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'castline-store-'));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it('starts numbering at one when the videos directory does not exist', async () => {
    const store = new FileRecordingInfoStore(path.join(baseDir, 'missing'));
    await expect(store.nextRecordingNumber()).resolves.toBe(1);
  });

  it('continues after the highest numbered folder', async () => {
    await fs.mkdir(path.join(baseDir, '003-first'));
    await fs.mkdir(path.join(baseDir, '011-second'));
    await fs.mkdir(path.join(baseDir, 'scratch'));
    await fs.writeFile(path.join(baseDir, '099-not-a-folder.txt'), '');

    const store = new FileRecordingInfoStore(baseDir);

    await expect(store.nextRecordingNumber()).resolves.toBe(12);
  });

  it('builds a descriptor from the request', () => {
    const store = new FileRecordingInfoStore(baseDir, undefined, fixedNow);
    const info = store.create(request, 5, 'DP-1');

    expect(info.metadata.folderName).toBe('005-intro-to-flakes');
    expect(info.files.folderPath).toBe(path.join(baseDir, '005-intro-to-flakes'));
    expect(info.environment.monitor).toBe('DP-1');
    expect(info.startTime).toBe('2026-03-01T10:00:00.000Z');
    expect(info.settings).toEqual({
      audioEnabled: true,
      screenEnabled: true,
      webcamEnabled: false,
      verticalEnabled: false,
      logosEnabled: true,
      logoLeft: '/tmp/logo-left.png',
      logoRight: undefined,
      logoBottom: undefined,
      titleColor: '#62A4C7'
    });
    expect(info.processing).toEqual({ status: 'recording', errors: [] });
  });

  it('stores the vertical flag only when both screen and webcam are captured', () => {
    const store = new FileRecordingInfoStore(baseDir, undefined, fixedNow);

    expect(store.create({ ...request, verticalVideo: true }, 1, '').settings.verticalEnabled).toBe(false);
    expect(
      store.create({ ...request, verticalVideo: true, recordWebcam: true }, 2, '').settings.verticalEnabled
    ).toBe(true);
  });

  it('persists, updates and reloads the descriptor', async () => {
    const store = new FileRecordingInfoStore(baseDir, undefined, fixedNow);
    const info = store.create(request, 1, '');
    await store.prepareFolder(info);
    await store.save(info);

    await store.recordFile(info, 'video', '/tmp/out/video.mp4');
    await store.markProcessed(info, new Error('merge failed'));

    const loaded = await store.load(info.files.folderPath);
    expect(loaded.files.video).toBe('/tmp/out/video.mp4');
    expect(loaded.processing).toEqual({
      status: 'failed',
      processedAt: '2026-03-01T10:00:00.000Z',
      errors: ['merge failed']
    });
    expect(loaded.metadata.title).toBe('Intro to Flakes!');
  });

  it('marks a successful run as completed', async () => {
    const store = new FileRecordingInfoStore(baseDir, undefined, fixedNow);
    const info = store.create(request, 2, '');
    await store.prepareFolder(info);
    await store.markProcessing(info);
    expect((await store.load(info.files.folderPath)).processing.status).toBe('processing');

    await store.markProcessed(info);
    expect((await store.load(info.files.folderPath)).processing.status).toBe('completed');
  });

  it('loads a recording by folder name and clears earlier results when processing again', async () => {
    const store = new FileRecordingInfoStore(baseDir, undefined, fixedNow);
    const info = store.create(request, 3, '');
    await store.prepareFolder(info);
    await store.markProcessed(info, new Error('merge failed'));

    const loaded = await store.load('003-intro-to-flakes');
    expect(loaded.processing.errors).toEqual(['merge failed']);

    await store.markProcessing(loaded);

    expect((await store.load(info.files.folderPath)).processing).toEqual({
      status: 'processing',
      errors: []
    });
  });

  it('rejects a descriptor that is not JSON', async () => {
    const folder = path.join(baseDir, '002-garbled');
    await fs.mkdir(folder);
    await fs.writeFile(path.join(folder, 'recording.json'), '{ not json');

    const store = new FileRecordingInfoStore(baseDir);

    await expect(store.load('002-garbled')).rejects.toThrow(`Invalid recording.json in ${folder}: `);
  });

  it('rejects a descriptor that does not match the schema', async () => {
    const folder = path.join(baseDir, '001-broken');
    await fs.mkdir(folder);
    await fs.writeFile(path.join(folder, 'recording.json'), JSON.stringify({ metadata: {} }));

    const store = new FileRecordingInfoStore(baseDir);

    await expect(store.load(folder)).rejects.toThrow(/^Invalid recording\.json in /);
  });
});
