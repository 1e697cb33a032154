/**
 * Track Selector
 *
 * Lists the audio or subtitle streams of a file with 1-based positions
 * and turns the user's answer into absolute stream indices.
 *
 * RULES:
 * - Empty answer: audio gets the first track in the preferred language
 *   (position 1 when none matches), subtitles get none
 * - One bad token discards the whole answer; the default applies instead
 * - "q" backs out
 */

import { createLogger } from '@encodeq/utils';
import {
  cancelled,
  isBackAnswer,
  selected,
  type Prompter,
  type Selection,
  type TrackSelection,
} from '@encodeq/core';
import type { StreamDescriptor } from '@encodeq/media';

const log = createLogger({ component: 'track-selector' });

export type TrackKind = 'audio' | 'subtitle';

export interface TrackCandidate {
  /** What the user types, starting at 1 */
  position: number;
  stream: StreamDescriptor;
}

export type ParsedPositions =
  | { ok: true; positions: number[] }
  | { ok: false; reason: string };

export interface TrackResolution {
  tracks: TrackSelection[];
  /** Why a typed answer was thrown away in favour of the default */
  rejection?: string;
}

const DEFAULT_CHANNELS = 2;

export function listCandidates(streams: readonly StreamDescriptor[], kind: TrackKind): TrackCandidate[] {
  return streams
    .filter(s => s.codecType === kind)
    .map((stream, i) => ({ position: i + 1, stream }));
}

/**
 * Reported channel count; missing or zero counts as stereo
 */
function channelsOf(stream: StreamDescriptor): number {
  return stream.channels !== undefined && stream.channels > 0 ? stream.channels : DEFAULT_CHANNELS;
}

export function toTrackSelection(stream: StreamDescriptor): TrackSelection {
  return {
    index: stream.index,
    language: stream.language,
    codecName: stream.codecName,
    channels: channelsOf(stream),
  };
}

/**
 * `[2] ENG (truehd) 8ch - Atmos`
 */
export function describeCandidate(candidate: TrackCandidate, kind: TrackKind): string {
  const { position, stream } = candidate;
  let line = `[${position}] ${stream.language.toUpperCase()} (${stream.codecName})`;
  if (kind === 'audio') {
    line += ` ${channelsOf(stream)}ch`;
  }
  if (stream.title) {
    line += ` - ${stream.title}`;
  }
  return line;
}

export function defaultPositions(
  candidates: readonly TrackCandidate[],
  kind: TrackKind,
  preferredLanguage: string
): number[] {
  if (kind === 'subtitle' || candidates.length === 0) return [];

  const preferred = candidates.find(c => c.stream.language === preferredLanguage.toLowerCase());
  return [preferred?.position ?? 1];
}

/**
 * Parse "1,3" or "1 3". All-or-nothing: any token that is not a position
 * in 1..count rejects the whole answer. Repeats keep their first place.
 */
export function parsePositions(input: string, count: number): ParsedPositions {
  const tokens = input.split(/[\s,]+/).filter(t => t !== '');
  const positions: number[] = [];

  for (const token of tokens) {
    if (!/^\d+$/.test(token)) {
      return { ok: false, reason: `"${token}" is not a track number` };
    }
    const position = Number(token);
    if (position < 1 || position > count) {
      return { ok: false, reason: `${position} is not between 1 and ${count}` };
    }
    if (!positions.includes(position)) {
      positions.push(position);
    }
  }

  return { ok: true, positions };
}

/**
 * Resolve a non-back answer against the candidate list
 */
export function resolveTrackSelection(
  candidates: readonly TrackCandidate[],
  kind: TrackKind,
  answer: string,
  preferredLanguage: string
): TrackResolution {
  const parsed = parsePositions(answer, candidates.length);
  const rejection = parsed.ok ? undefined : parsed.reason;
  const positions = parsed.ok && parsed.positions.length > 0
    ? parsed.positions
    : defaultPositions(candidates, kind, preferredLanguage);

  const tracks = positions.flatMap(position => {
    const candidate = candidates.find(c => c.position === position);
    return candidate ? [toTrackSelection(candidate.stream)] : [];
  });

  return { tracks, rejection };
}

export interface TrackSelectorOptions {
  prompter: Prompter;
  preferredLanguage: string;
}

export class TrackSelector {
  private prompter: Prompter;
  private preferredLanguage: string;

  constructor(options: TrackSelectorOptions) {
    this.prompter = options.prompter;
    this.preferredLanguage = options.preferredLanguage;
  }

  async select(streams: readonly StreamDescriptor[], kind: TrackKind): Promise<Selection<TrackSelection[]>> {
    const candidates = listCandidates(streams, kind);
    if (candidates.length === 0) {
      this.prompter.say(`No ${kind} tracks found.`);
      return selected([]);
    }

    this.prompter.say(`--- ${kind.toUpperCase()} SELECTION ---`);
    for (const candidate of candidates) {
      this.prompter.say(describeCandidate(candidate, kind));
    }

    const defaultLabel = kind === 'audio' ? `default ${this.preferredLanguage.toUpperCase()}` : 'none';
    const answer = await this.prompter.ask(`Choose tracks (e.g. 1,3; Enter for ${defaultLabel}; q=Back): `);
    if (isBackAnswer(answer)) {
      return cancelled();
    }

    const resolution = resolveTrackSelection(candidates, kind, answer, this.preferredLanguage);
    if (resolution.rejection) {
      log.warn({ kind, answer, reason: resolution.rejection }, 'Track selection discarded');
      this.prompter.say(`Ignoring "${answer.trim()}": ${resolution.rejection}. Using the default.`);
    }

    return selected(resolution.tracks);
  }
}
