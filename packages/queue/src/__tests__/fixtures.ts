import type { Job, Preset, Prompter } from '@encodeq/core';
import type { StreamDescriptor } from '@encodeq/media';
import { PresetCatalog } from '@encodeq/processing';

const catalog = new PresetCatalog();

export function preset(id: string): Preset {
  const found = catalog.get(id);
  if (!found) throw new Error(`no preset ${id}`);
  return found;
}

/**
 * Answers questions from a fixed script and records everything shown
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly messages: string[] = [];
  private answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`unscripted question: ${question}`);
    }
    return answer;
  }

  say(message: string): void {
    this.messages.push(message);
  }

  get remaining(): number {
    return this.answers.length;
  }
}

function stream(partial: Partial<StreamDescriptor> & Pick<StreamDescriptor, 'index' | 'codecType' | 'codecName'>): StreamDescriptor {
  return { language: 'und', ...partial };
}

export const STREAMS: readonly StreamDescriptor[] = [
  stream({ index: 0, codecType: 'video', codecName: 'hevc', width: 3840, height: 2160 }),
  stream({ index: 1, codecType: 'audio', codecName: 'ac3', channels: 6, language: 'ger' }),
  stream({ index: 2, codecType: 'audio', codecName: 'truehd', channels: 8, language: 'eng', title: 'Atmos' }),
  stream({ index: 3, codecType: 'audio', codecName: 'aac', language: 'eng' }),
  stream({ index: 4, codecType: 'subtitle', codecName: 'subrip', language: 'eng' }),
  stream({ index: 5, codecType: 'subtitle', codecName: 'subrip', language: 'ita' }),
];

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    inputPath: '/films/Movie.mkv',
    outputPath: '/encoded/Movie_enc_4K VideoToolbox (CQ 65).mkv',
    durationSeconds: 6012.5,
    isHdr: true,
    crop: { width: 3840, height: 1600, x: 0, y: 280 },
    selectedAudio: [
      { index: 2, language: 'eng', codecName: 'truehd', channels: 8 },
      { index: 1, language: 'ger', codecName: 'ac3', channels: 6 },
    ],
    selectedSubtitles: [{ index: 4, language: 'eng', codecName: 'subrip', channels: 2 }],
    audioMode: 'smart-surround',
    preset: preset('1'),
    ...overrides,
  };
}
