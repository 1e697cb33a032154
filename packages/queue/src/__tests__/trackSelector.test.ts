import { describe, it, expect } from 'vitest';
import {
  TrackSelector,
  describeCandidate,
  toTrackSelection,
  listCandidates,
  parsePositions,
  resolveTrackSelection,
  type TrackCandidate,
} from '../trackSelector.js';
import { ScriptedPrompter, STREAMS } from './fixtures.js';

const audio = listCandidates(STREAMS, 'audio');
const candidate = (list: readonly TrackCandidate[], position: number): TrackCandidate => {
  const found = list.find(c => c.position === position);
  if (!found) throw new Error(`no candidate at ${position}`);
  return found;
};
const subtitles = listCandidates(STREAMS, 'subtitle');

const indices = (answer: string, kind: 'audio' | 'subtitle' = 'audio', language = 'eng') =>
  resolveTrackSelection(kind === 'audio' ? audio : subtitles, kind, answer, language).tracks.map(t => t.index);

describe('listCandidates', () => {
  it('numbers tracks of one kind from 1 in container order', () => {
    expect(audio.map(c => [c.position, c.stream.index])).toEqual([[1, 1], [2, 2], [3, 3]]);
    expect(subtitles.map(c => [c.position, c.stream.index])).toEqual([[1, 4], [2, 5]]);
  });
});

describe('describeCandidate', () => {
  it('shows language, codec, channels and title for audio', () => {
    expect(describeCandidate(candidate(audio, 2), 'audio')).toBe('[2] ENG (truehd) 8ch - Atmos');
  });

  it('leaves channels out for subtitles', () => {
    expect(describeCandidate(candidate(subtitles, 2), 'subtitle')).toBe('[2] ITA (subrip)');
  });
});

describe('parsePositions', () => {
  it('accepts commas and spaces and drops repeats', () => {
    expect(parsePositions('3, 1 3,,1', 3)).toEqual({ ok: true, positions: [3, 1] });
  });

  it('rejects a non-numeric token', () => {
    expect(parsePositions('1,x', 3)).toEqual({ ok: false, reason: '"x" is not a track number' });
  });

  it('rejects positions outside the list', () => {
    expect(parsePositions('0', 3)).toEqual({ ok: false, reason: '0 is not between 1 and 3' });
    expect(parsePositions('1 4', 3)).toEqual({ ok: false, reason: '4 is not between 1 and 3' });
  });
});

describe('resolveTrackSelection', () => {
  it('defaults audio to the first track in the preferred language', () => {
    expect(indices('')).toEqual([2]);
  });

  it('defaults audio to the first track when no language matches', () => {
    expect(indices('', 'audio', 'jpn')).toEqual([1]);
  });

  it('defaults subtitles to none', () => {
    expect(indices('', 'subtitle')).toEqual([]);
  });

  it('maps positions to absolute stream indices in the order typed', () => {
    expect(indices('3 1')).toEqual([3, 1]);
    expect(indices('2', 'subtitle')).toEqual([5]);
  });

  it('fills in two channels when the probe reported none', () => {
    const [track] = resolveTrackSelection(audio, 'audio', '3', 'eng').tracks;
    expect(track).toEqual({ index: 3, language: 'eng', codecName: 'aac', channels: 2 });
  });

  it('treats a reported channel count of zero as stereo', () => {
    const track = toTrackSelection({ index: 7, codecType: 'audio', codecName: 'opus', language: 'eng', channels: 0 });
    expect(track.channels).toBe(2);
  });

  it('discards the whole answer when one token is bad', () => {
    const resolution = resolveTrackSelection(audio, 'audio', '1, 9', 'eng');

    expect(resolution.tracks.map(t => t.index)).toEqual([2]);
    expect(resolution.rejection).toBe('9 is not between 1 and 3');
  });
});

describe('TrackSelector', () => {
  it('lists the tracks and returns the chosen ones', async () => {
    const prompter = new ScriptedPrompter(['1']);
    const selection = await new TrackSelector({ prompter, preferredLanguage: 'eng' }).select(STREAMS, 'subtitle');

    expect(selection).toEqual({
      kind: 'selected',
      value: [{ index: 4, language: 'eng', codecName: 'subrip', channels: 2 }],
    });
    expect(prompter.messages).toEqual(['--- SUBTITLE SELECTION ---', '[1] ENG (subrip)', '[2] ITA (subrip)']);
    expect(prompter.questions).toEqual(['Choose tracks (e.g. 1,3; Enter for none; q=Back): ']);
  });

  it('treats q in any case as backing out', async () => {
    const prompter = new ScriptedPrompter(['Q']);
    const selection = await new TrackSelector({ prompter, preferredLanguage: 'eng' }).select(STREAMS, 'audio');

    expect(selection).toEqual({ kind: 'cancelled' });
  });

  it('says why a typed answer was ignored', async () => {
    const prompter = new ScriptedPrompter(['1,x']);
    const selection = await new TrackSelector({ prompter, preferredLanguage: 'eng' }).select(STREAMS, 'audio');

    expect(selection.kind === 'selected' && selection.value.map(t => t.index)).toEqual([2]);
    expect(prompter.messages.at(-1)).toBe('Ignoring "1,x": "x" is not a track number. Using the default.');
  });

  it('selects nothing without asking when there are no candidates', async () => {
    const prompter = new ScriptedPrompter([]);
    const videoOnly = STREAMS.filter(s => s.codecType === 'video');

    const selection = await new TrackSelector({ prompter, preferredLanguage: 'eng' }).select(videoOnly, 'audio');

    expect(selection).toEqual({ kind: 'selected', value: [] });
    expect(prompter.questions).toEqual([]);
    expect(prompter.messages).toEqual(['No audio tracks found.']);
  });
});
