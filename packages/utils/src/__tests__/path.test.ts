import { describe, it, expect } from 'vitest';
import { cleanInputPath, getBasename, sanitizeFilename } from '../path.js';

describe('sanitizeFilename', () => {
  it('replaces slashes and colons with dashes', () => {
    expect(sanitizeFilename('4K HDR/SDR: CQ 65')).toBe('4K HDR-SDR- CQ 65');
  });

  it('leaves other characters alone', () => {
    expect(sanitizeFilename('1080p VideoToolbox (CQ 65)')).toBe('1080p VideoToolbox (CQ 65)');
  });
});

describe('cleanInputPath', () => {
  it('strips whitespace and surrounding quotes', () => {
    expect(cleanInputPath("  '/media/films/Movie.mkv'  ", 'linux')).toBe('/media/films/Movie.mkv');
  });

  it('removes shell escapes on POSIX', () => {
    expect(cleanInputPath('/media/My\\ Movie\\ \\(2019\\).mkv', 'darwin')).toBe('/media/My Movie (2019).mkv');
  });

  it('keeps backslashes on Windows', () => {
    expect(cleanInputPath('"C:\\Videos\\clip.mp4"', 'win32')).toBe('C:\\Videos\\clip.mp4');
  });
});

describe('getBasename', () => {
  it('drops only the last extension', () => {
    expect(getBasename('/a/b/Film.2020.mkv')).toBe('Film.2020');
  });
});
