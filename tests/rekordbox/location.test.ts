/**
 * Tests for location URL encoding.
 */

import { describe, it, expect } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import { encodeUrlPath, toFileUrl, trackLocation } from '../../src/rekordbox/location.js';
import { resolveTrackPath } from '../../src/paths.js';

describe('encodeUrlPath', () => {
  it('keeps unreserved characters and slashes', () => {
    expect(encodeUrlPath('/Music/a-b_c.d~e/Track01.mp3')).toBe('/Music/a-b_c.d~e/Track01.mp3');
  });

  it('encodes reserved characters that encodeURIComponent leaves alone', () => {
    expect(encodeUrlPath("/Track (1)! it's*.mp3")).toBe('/Track%20%281%29%21%20it%27s%2A.mp3');
  });

  it('encodes non-ASCII characters as UTF-8', () => {
    expect(encodeUrlPath('/Música/é.mp3')).toBe('/M%C3%BAsica/%C3%A9.mp3');
  });
});

describe('toFileUrl', () => {
  it('prefixes absolute POSIX paths', () => {
    expect(toFileUrl('/Users/dj/My Music/Rock & Roll.mp3')).toBe(
      'file://localhost/Users/dj/My%20Music/Rock%20%26%20Roll.mp3'
    );
  });

  it('converts Windows separators and adds the leading slash', () => {
    expect(toFileUrl('C:\\Music\\a b.mp3')).toBe('file://localhost/C%3A/Music/a%20b.mp3');
  });
});

describe('trackLocation', () => {
  it('resolves the path before encoding', () => {
    expect(trackLocation('/music/../music/x.mp3')).toBe('file://localhost/music/x.mp3');
  });

  it('expands the home directory', () => {
    expect(trackLocation('~/Music/x.mp3')).toBe(
      toFileUrl(resolveTrackPath(path.join(os.homedir(), 'Music', 'x.mp3')))
    );
  });
});
