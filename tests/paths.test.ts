/**
 * Tests for path helpers.
 */

import { describe, it, expect } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import { expandHome } from '../src/paths.js';

describe('expandHome', () => {
  it('expands ~ and ~/', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/Music/_Serato_')).toBe(path.join(os.homedir(), 'Music', '_Serato_'));
  });

  it('leaves other paths alone', () => {
    expect(expandHome('/music/~/a.mp3')).toBe('/music/~/a.mp3');
    expect(expandHome('~user/a.mp3')).toBe('~user/a.mp3');
  });
});
