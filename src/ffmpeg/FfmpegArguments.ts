import { InvalidParametersError } from '../coordinator/errors';
import type { StreamParameters } from '../coordinator/types';

const FORMAT_PATTERN = /^[A-Za-z0-9_]+$/u;

export interface FfmpegSettings {
  /** Value for `-loglevel`. */
  logLevel: string;
  /** lavfi graph used as input when a start request names no source. */
  defaultSource: string;
}

export const DEFAULT_FFMPEG_SETTINGS: FfmpegSettings = {
  logLevel: 'warning',
  defaultSource: 'testsrc2=size=1280x720:rate=30',
};

export function validateStreamParameters(parameters: StreamParameters): void {
  if (typeof parameters.format !== 'string' || !FORMAT_PATTERN.test(parameters.format)) {
    throw new InvalidParametersError('format must be an ffmpeg muxer name (letters, digits, underscore)');
  }
  if (typeof parameters.target !== 'string' || parameters.target.trim() === '') {
    throw new InvalidParametersError('target must be a non-empty string');
  }
  if (parameters.source !== undefined && (typeof parameters.source !== 'string' || parameters.source.trim() === '')) {
    throw new InvalidParametersError('source must be a non-empty string when given');
  }
}

/**
 * Builds the ffmpeg command line for a stream.
 *
 * `-progress pipe:1` is always present: its `progress=` lines on stdout are the readiness signal.
 * Values are passed as separate argv entries, no shell is involved.
 */
export function buildFfmpegArgs(parameters: StreamParameters, settings: FfmpegSettings = DEFAULT_FFMPEG_SETTINGS): string[] {
  validateStreamParameters(parameters);

  const input = parameters.source ?
    [ '-re', '-i', parameters.source ] :
    [ '-re', '-f', 'lavfi', '-i', settings.defaultSource ];

  return [
    '-hide_banner',
    '-nostdin',
    '-loglevel', settings.logLevel,
    '-nostats',
    '-progress', 'pipe:1',
    '-y',
    ...input,
    '-f', parameters.format,
    parameters.target,
  ];
}

/**
 * Picks the known fields out of a parsed JSON body and validates them.
 */
export function toStreamParameters(body: unknown): StreamParameters {
  if (!body || typeof body !== 'object') {
    throw new InvalidParametersError('Request body must be a JSON object');
  }
  const record = body as Record<string, unknown>;
  const parameters: StreamParameters = {
    format: typeof record.format === 'string' ? record.format : '',
    target: typeof record.target === 'string' ? record.target : '',
  };
  if (record.source !== undefined) {
    if (typeof record.source !== 'string') {
      throw new InvalidParametersError('source must be a string');
    }
    parameters.source = record.source;
  }
  validateStreamParameters(parameters);
  return parameters;
}
