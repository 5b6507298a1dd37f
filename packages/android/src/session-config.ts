/**
 * Session configuration
 * Validates streaming parameters and turns them into a helper command line
 */

import { randomInt } from 'crypto';
import { z } from 'zod';
import { ValidationError, STREAM_KINDS } from '@droidrelay/core';
import type { StreamKind } from '@droidrelay/core';
import type { EngineConfig } from './config';

const dottedVersion = /^\d+(\.\d+)*$/;
const cropGeometry = /^\d+:\d+:\d+:\d+$/;

export const sessionConfigSchema = z.object({
  video: z.boolean(),
  audio: z.boolean(),
  control: z.boolean(),
  maxSize: z.number().int().min(0).max(8192),
  videoBitRate: z.number().int().min(100_000).max(100_000_000),
  maxFps: z.number().int().min(1).max(240),
  videoCodec: z.enum(['h264', 'h265', 'av1']),
  audioCodec: z.enum(['opus', 'aac', 'flac', 'raw']),
  audioBitRate: z.number().int().min(8_000).max(512_000),
  displayId: z.number().int().min(0).nullable(),
  crop: z.string().regex(cropGeometry, 'must be W:H:X:Y').nullable(),
  lockVideoOrientation: z.number().int().min(0).max(3).nullable(),
  sendFrameMeta: z.boolean(),
  helperVersion: z.string().regex(dottedVersion, 'must be a dotted version'),
}).strict();

const overridesSchema = sessionConfigSchema.partial().strict();

export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type SessionConfigOverrides = z.infer<typeof overridesSchema>;

/**
 * Compare dotted versions numerically; missing parts count as 0
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);

  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return 0;
}

interface ConfigConstraint {
  field: keyof SessionConfig;
  reason: string;
  holds: (config: SessionConfig) => boolean;
}

/**
 * Cross-field rules, checked in order after every field is valid
 */
const CONSTRAINTS: readonly ConfigConstraint[] = [
  {
    field: 'video',
    reason: 'at least one of video, audio or control must be enabled',
    holds: c => c.video || c.audio || c.control,
  },
  {
    field: 'audio',
    reason: 'audio requires helper version 2.0 or later',
    holds: c => !c.audio || compareVersions(c.helperVersion, '2.0') >= 0,
  },
  {
    field: 'videoCodec',
    reason: 'codecs other than h264 require helper version 2.0 or later',
    holds: c => c.videoCodec === 'h264' || compareVersions(c.helperVersion, '2.0') >= 0,
  },
  {
    field: 'audioCodec',
    reason: 'flac requires helper version 2.1 or later',
    holds: c => c.audioCodec !== 'flac' || compareVersions(c.helperVersion, '2.1') >= 0,
  },
  {
    field: 'lockVideoOrientation',
    reason: 'not supported by helper version 3.0 or later',
    holds: c => c.lockVideoOrientation === null || compareVersions(c.helperVersion, '3.0') < 0,
  },
  {
    field: 'crop',
    reason: 'crop requires video',
    holds: c => c.crop === null || c.video,
  },
];

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues.find(i => i.code === 'unrecognized_keys') ?? error.issues[0];

  if (issue.code === 'unrecognized_keys') {
    return new ValidationError(issue.keys[0] ?? '', 'unknown field');
  }
  return new ValidationError(issue.path.join('.'), issue.message);
}

/**
 * Defaults for a new session, taken from engine configuration
 */
export function sessionDefaults(config: EngineConfig): SessionConfig {
  return {
    video: true,
    audio: false,
    control: true,
    maxSize: config.defaultMaxSize,
    videoBitRate: config.defaultBitRate,
    maxFps: config.defaultMaxFps,
    videoCodec: 'h264',
    audioCodec: 'opus',
    audioBitRate: 128_000,
    displayId: null,
    crop: null,
    lockVideoOrientation: null,
    sendFrameMeta: true,
    helperVersion: config.helperVersion,
  };
}

/**
 * Apply overrides to defaults field by field and validate the result.
 * Throws ValidationError for the first violation found.
 */
export function buildSessionConfig(defaults: SessionConfig, overrides: unknown = {}): Readonly<SessionConfig> {
  const parsedOverrides = overridesSchema.safeParse(overrides);
  if (!parsedOverrides.success) {
    throw toValidationError(parsedOverrides.error);
  }

  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(parsedOverrides.data)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const parsed = sessionConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }

  const config = parsed.data;
  for (const constraint of CONSTRAINTS) {
    if (!constraint.holds(config)) {
      throw new ValidationError(constraint.field, constraint.reason);
    }
  }

  return Object.freeze(config);
}

/**
 * Stream kinds the session carries, in STREAM_KINDS order
 */
export function enabledStreams(config: SessionConfig): StreamKind[] {
  return STREAM_KINDS.filter(kind => config[kind]);
}

/**
 * Random 31-bit session id the helper uses to name its socket
 */
export function generateScid(): string {
  return randomInt(0, 0x7fffffff).toString(16).padStart(8, '0');
}

export function helperSocketName(scid: string): string {
  return `scrcpy_${scid}`;
}

export function toHelperArgs(config: SessionConfig, scid: string): string[] {
  const modern = compareVersions(config.helperVersion, '2.0') >= 0;
  const args = [`scid=${scid}`, 'log_level=info'];

  if (modern) {
    args.push(`video=${config.video}`, `audio=${config.audio}`);
  }
  args.push(`control=${config.control}`);

  if (config.video) {
    args.push(`max_size=${config.maxSize}`);
    args.push(modern ? `video_bit_rate=${config.videoBitRate}` : `bit_rate=${config.videoBitRate}`);
    args.push(`max_fps=${config.maxFps}`);
    if (modern) {
      args.push(`video_codec=${config.videoCodec}`);
    }
  }

  if (config.audio) {
    args.push(`audio_codec=${config.audioCodec}`, `audio_bit_rate=${config.audioBitRate}`);
  }

  if (config.displayId !== null) {
    args.push(`display_id=${config.displayId}`);
  }
  if (config.crop !== null) {
    args.push(`crop=${config.crop}`);
  }
  if (config.lockVideoOrientation !== null) {
    args.push(`lock_video_orientation=${config.lockVideoOrientation}`);
  }

  args.push(
    'tunnel_forward=true',
    'send_device_meta=true',
    'send_codec_meta=true',
    `send_frame_meta=${config.sendFrameMeta}`,
    'send_dummy_byte=false',
    'downsize_on_error=false',
    'cleanup=true',
    'power_off_on_close=false',
  );

  return args;
}

export function toHelperCommand(config: SessionConfig, options: { remotePath: string; scid: string }): string {
  const args = toHelperArgs(config, options.scid);
  return `CLASSPATH=${options.remotePath} app_process / com.genymobile.scrcpy.Server ${config.helperVersion} ${args.join(' ')}`;
}
