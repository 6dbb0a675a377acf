import fs from 'node:fs/promises';
import path from 'node:path';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { ProducedFileKind, RecordingRequest } from '../../types';
import {
  RECORDING_INFO_FILE,
  RecordingInfo,
  createRecordingInfo,
  parseRecordingNumber,
  recordingInfoSchema
} from './RecordingInfo';

export interface RecordingInfoStore {
  nextRecordingNumber(): Promise<number>;
  create(request: RecordingRequest, recordingNumber: number, monitor: string): RecordingInfo;
  prepareFolder(info: RecordingInfo): Promise<void>;
  save(info: RecordingInfo): Promise<void>;
  load(folderPath: string): Promise<RecordingInfo>;
  recordFile(info: RecordingInfo, kind: ProducedFileKind, filePath: string): Promise<void>;
  markProcessing(info: RecordingInfo): Promise<void>;
  markProcessed(info: RecordingInfo, error?: Error): Promise<void>;
}

const isMissingPath = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class FileRecordingInfoStore implements RecordingInfoStore {
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(
    private readonly baseDir: string,
    private readonly logger?: StructuredLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  public async nextRecordingNumber(): Promise<number> {
    let entries: string[];

    try {
      const dirents = await fs.readdir(this.baseDir, { withFileTypes: true });
      entries = dirents.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (error) {
      if (isMissingPath(error)) {
        return 1;
      }

      throw error;
    }

    const highest = entries.reduce((max, name) => Math.max(max, parseRecordingNumber(name) ?? 0), 0);
    return highest + 1;
  }

  public create(request: RecordingRequest, recordingNumber: number, monitor: string): RecordingInfo {
    return createRecordingInfo({
      request,
      recordingNumber,
      monitor,
      baseDir: this.baseDir,
      now: this.now()
    });
  }

  public async prepareFolder(info: RecordingInfo): Promise<void> {
    await fs.mkdir(info.files.folderPath, { recursive: true });
  }

  // Serialized so a late status update never lands under an earlier one.
  public save(info: RecordingInfo): Promise<void> {
    info.updatedAt = this.now().toISOString();
    const filePath = path.join(info.files.folderPath, RECORDING_INFO_FILE);
    const payload = `${JSON.stringify(info, null, 2)}\n`;

    const write = this.writeQueue.then(async () => {
      const tempPath = `${filePath}.tmp`;
      await fs.writeFile(tempPath, payload, 'utf8');
      await fs.rename(tempPath, filePath);
    });

    this.writeQueue = write.catch((error) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.debug('Recording info write failed', { filePath, detail });
    });

    return write;
  }

  // Relative folders, such as a bare folder name, resolve against the videos directory.
  public async load(folderPath: string): Promise<RecordingInfo> {
    const folder = path.resolve(this.baseDir, folderPath);
    const filePath = path.join(folder, RECORDING_INFO_FILE);
    const raw = await fs.readFile(filePath, 'utf8');

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid ${RECORDING_INFO_FILE} in ${folder}: ${detail}`);
    }

    const parsed = recordingInfoSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid ${RECORDING_INFO_FILE} in ${folder}: ${issues}`);
    }

    return parsed.data;
  }

  public async recordFile(info: RecordingInfo, kind: ProducedFileKind, filePath: string): Promise<void> {
    info.files[kind] = filePath;
    this.logger?.info('Recording file produced', { kind, filePath });
    await this.save(info);
  }

  public async markProcessing(info: RecordingInfo): Promise<void> {
    info.processing = { status: 'processing', errors: [] };
    await this.save(info);
  }

  public async markProcessed(info: RecordingInfo, error?: Error): Promise<void> {
    info.processing.status = error ? 'failed' : 'completed';
    info.processing.processedAt = this.now().toISOString();
    if (error) {
      info.processing.errors.push(error.message);
    }

    await this.save(info);
  }
}
