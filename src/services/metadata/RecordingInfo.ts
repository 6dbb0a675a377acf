import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { deriveCapabilities } from '../../core/pipeline/ProcessingState';
import { RecordingRequest } from '../../types';

export const APP_VERSION = '0.1.0';
export const RECORDING_INFO_FILE = 'recording.json';

const MAX_SLUG_LENGTH = 50;

export const processingStatusSchema = z.enum(['recording', 'processing', 'completed', 'failed']);

export const recordingInfoSchema = z.object({
  metadata: z.object({
    number: z.number().int().positive(),
    title: z.string(),
    description: z.string(),
    topic: z.string(),
    presenter: z.string(),
    folderName: z.string().min(1)
  }),
  startTime: z.string(),
  environment: z.object({
    os: z.string(),
    arch: z.string(),
    hostname: z.string(),
    monitor: z.string()
  }),
  files: z.object({
    folderPath: z.string().min(1),
    video: z.string().optional(),
    audio: z.string().optional(),
    webcam: z.string().optional(),
    merged: z.string().optional(),
    vertical: z.string().optional()
  }),
  settings: z.object({
    audioEnabled: z.boolean(),
    screenEnabled: z.boolean(),
    webcamEnabled: z.boolean(),
    verticalEnabled: z.boolean(),
    logosEnabled: z.boolean(),
    logoLeft: z.string().optional(),
    logoRight: z.string().optional(),
    logoBottom: z.string().optional(),
    titleColor: z.string().optional()
  }),
  processing: z.object({
    status: processingStatusSchema,
    processedAt: z.string().optional(),
    errors: z.array(z.string())
  }),
  appVersion: z.string(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export type RecordingInfo = z.infer<typeof recordingInfoSchema>;
export type ProcessingStatus = z.infer<typeof processingStatusSchema>;

export const sanitizeForFilename = (value: string): string =>
  value
    .toLowerCase()
    .replace(/ /g, '-')
    .replace(/[^a-z0-9\-_]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH);

export const generateFolderName = (recordingNumber: number, title: string): string => {
  const slug = sanitizeForFilename(title) || 'recording';
  return `${String(recordingNumber).padStart(3, '0')}-${slug}`;
};

export const parseRecordingNumber = (folderName: string): number | undefined => {
  const match = /^(\d{3,})-/.exec(folderName);
  return match ? Number.parseInt(match[1], 10) : undefined;
};

export interface CreateRecordingInfoInput {
  request: RecordingRequest;
  recordingNumber: number;
  monitor: string;
  baseDir: string;
  now: Date;
}

export const createRecordingInfo = ({
  request,
  recordingNumber,
  monitor,
  baseDir,
  now
}: CreateRecordingInfoInput): RecordingInfo => {
  const folderName = generateFolderName(recordingNumber, request.title);
  const timestamp = now.toISOString();
  const { logos } = request;

  return {
    metadata: {
      number: recordingNumber,
      title: request.title,
      description: request.description,
      topic: request.topic,
      presenter: request.presenter,
      folderName
    },
    startTime: timestamp,
    environment: {
      os: os.platform(),
      arch: os.arch(),
      hostname: os.hostname(),
      monitor
    },
    files: {
      folderPath: path.join(baseDir, folderName)
    },
    settings: {
      audioEnabled: request.recordAudio,
      screenEnabled: request.recordScreen,
      webcamEnabled: request.recordWebcam,
      verticalEnabled: deriveCapabilities(request).createVertical,
      logosEnabled: Boolean(logos.left || logos.right || logos.bottom),
      logoLeft: logos.left,
      logoRight: logos.right,
      logoBottom: logos.bottom,
      titleColor: logos.titleColor
    },
    processing: {
      status: 'recording',
      errors: []
    },
    appVersion: APP_VERSION,
    createdAt: timestamp,
    updatedAt: timestamp
  };
};
